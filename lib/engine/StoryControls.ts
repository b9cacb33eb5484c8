import {
  MSG_AUTO_SAVE,
  MSG_GOODBYE,
  MSG_LOADED,
  MSG_NO_SAVE,
  MSG_NOT_UNDERSTOOD,
  MSG_SAVE_FIRST,
  MSG_SAVED,
  SAVED_FLAG,
} from "./StoryConstants";
import { resumeStory } from "./StoryEngine";
import { getFlag, setFlag } from "./StoryEnvironment";
import { describeStoryError } from "./StoryErrors";
import { parseAnswer, sanitize } from "./StoryInput";
import type { EnvironmentStore } from "./StoryRepo";
import type {
  OP,
  StoryAdvanceResult,
  StoryContext,
  StorySession,
} from "./StoryTypes";
import { isBlank } from "../TextHelpers";

export type ControlCommand = "quit" | "save" | "load";

export type CommandResult =
  | { handled: false }
  | { handled: true; halt: boolean; result: StoryAdvanceResult | null };

export type ControlContext = {
  session: StorySession;
  story: StoryContext;
  store: EnvironmentStore;
  render: (ops: OP[]) => Promise<void>;
  // Shows the question and waits for the next raw line; null at end of input
  ask: (question: string) => Promise<string | null>;
};

const COMMAND_DICTIONARIES: [string, ControlCommand][] = [
  ["EXITS", "quit"],
  ["SAVES", "save"],
  ["LOADS", "load"],
];

export function detectCommand(
  input: string,
  story: StoryContext
): ControlCommand | null {
  const hit = COMMAND_DICTIONARIES.find(([name]) =>
    story.dictionaries.isMember(name, input)
  );
  return hit ? hit[1] : null;
}

export async function handleCommand(
  input: string,
  ctx: ControlContext
): Promise<CommandResult> {
  const command = detectCommand(input, ctx.story);

  if (command === "quit") {
    await quit(ctx);
    return { handled: true, halt: true, result: null };
  }

  if (command === "save") {
    await saveEnvironment(ctx);
    return { handled: true, halt: false, result: null };
  }

  if (command === "load") {
    return { handled: true, halt: false, result: await loadEnvironment(ctx) };
  }

  return { handled: false };
}

export async function saveEnvironment(ctx: ControlContext): Promise<boolean> {
  const saved = ctx.store.save(ctx.session.env);
  if (!saved.ok) {
    await say(ctx, describeStoryError(saved.error));
    return false;
  }
  setFlag(ctx.session.env, SAVED_FLAG, true);
  await say(ctx, MSG_SAVED);
  return true;
}

export async function loadEnvironment(
  ctx: ControlContext
): Promise<StoryAdvanceResult | null> {
  const loaded = ctx.store.load(ctx.session.env.identity);
  if (!loaded.ok) {
    await say(
      ctx,
      loaded.error.kind === "environment-not-found"
        ? MSG_NO_SAVE
        : describeStoryError(loaded.error)
    );
    return null;
  }
  const resumed = resumeStory(ctx.session, loaded.env, ctx.story);
  if (!resumed.ok) {
    await say(ctx, describeStoryError(resumed.error));
    return null;
  }
  await say(ctx, MSG_LOADED);
  return resumed.result;
}

async function quit(ctx: ControlContext) {
  if (!getFlag(ctx.session.env, SAVED_FLAG)) {
    while (true) {
      const raw = await ctx.ask(MSG_SAVE_FIRST);
      if (raw === null) {
        break;
      }
      const input = sanitize(raw);
      if (isBlank(input)) {
        continue;
      }
      const answer = parseAnswer(
        input,
        ctx.story.dictionaries,
        ctx.story.options.verbose
      );
      if (answer === null) {
        await say(ctx, MSG_NOT_UNDERSTOOD);
        continue;
      }
      if (answer === "unsure") {
        await say(ctx, MSG_AUTO_SAVE);
      }
      if (answer !== "no") {
        await saveEnvironment(ctx);
      }
      break;
    }
  }
  await say(ctx, MSG_GOODBYE);
}

async function say(ctx: ControlContext, body: string) {
  await ctx.render([{ type: "message", body }]);
}

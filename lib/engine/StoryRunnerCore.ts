import { handleCommand, type ControlContext } from "./StoryControls";
import { advanceStory, resumeStory, startStory } from "./StoryEngine";
import { describeStoryError } from "./StoryErrors";
import { sanitize } from "./StoryInput";
import type { EnvironmentStore } from "./StoryRepo";
import {
  SeamType,
  type StoryAdvanceResult,
  type StoryContext,
  type StorySession,
} from "./StoryTypes";

export type InteractiveContext = ControlContext & {
  readLine: () => Promise<string | null>;
  beforePrompt?: () => void;
};

export type OpenedStory = {
  result: StoryAdvanceResult;
  // Why a requested resume fell back to a fresh start, if it did
  notice: string | null;
};

/**
 * Resumes the session's saved game when asked to and it loads; otherwise
 * starts from the given block. A missing or malformed starting document throws.
 */
export function openStory(
  session: StorySession,
  story: StoryContext,
  store: EnvironmentStore,
  start: { document: string; block: string },
  resume: boolean
): OpenedStory {
  let notice: string | null = null;
  if (resume) {
    const saved = store.load(session.env.identity);
    if (saved.ok) {
      const resumed = resumeStory(session, saved.env, story);
      if (resumed.ok) {
        return { result: resumed.result, notice: null };
      }
      notice = describeStoryError(resumed.error);
    } else if (saved.error.kind !== "environment-not-found") {
      notice = describeStoryError(saved.error);
    }
  }
  return { result: startStory(session, story, start), notice };
}

/**
 * Feeds player lines into the story until it stops asking for input, the
 * player quits, or the input runs out. Control words never reach the matcher.
 */
export async function runInteractive(
  first: StoryAdvanceResult,
  ctx: InteractiveContext
): Promise<StoryAdvanceResult> {
  let result = first;
  await ctx.render(result.ops);

  while (result.seam === SeamType.INPUT) {
    ctx.beforePrompt?.();
    const raw = await ctx.readLine();
    if (raw === null) {
      break;
    }

    const command = await handleCommand(sanitize(raw), ctx);
    if (command.handled) {
      if (command.halt) {
        break;
      }
      if (command.result) {
        result = command.result;
        await ctx.render(result.ops);
      }
      continue;
    }

    result = advanceStory(ctx.session, raw, ctx.story);
    await ctx.render(result.ops);
  }

  return result;
}

/**
 * Runs a story to completion against a fixed list of inputs, with no control
 * command handling. Stops when the inputs run out.
 */
export function runUntilComplete(
  first: StoryAdvanceResult,
  inputs: string[],
  advance: (input: string) => StoryAdvanceResult
): StoryAdvanceResult {
  let result: StoryAdvanceResult = { ...first, ops: [...first.ops] };
  while (result.seam === SeamType.INPUT) {
    const input = inputs.shift();
    if (input === undefined) {
      break;
    }
    const next = advance(input);
    result = { ...next, ops: [...result.ops, ...next.ops] };
  }
  return result;
}

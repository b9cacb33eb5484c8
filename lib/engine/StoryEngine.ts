import chalk from "chalk";
import {
  lineText,
  resolveChoiceLabel,
  resolveLine,
} from "./StoryConditionals";
import {
  GAME_OVER_FLAG,
  MSG_GAME_OVER,
  MSG_NOT_UNDERSTOOD,
  SAVED_FLAG,
} from "./StoryConstants";
import {
  cloneEnvironment,
  createEnvironment,
  getFlag,
  setFlag,
  updateCounter,
} from "./StoryEnvironment";
import {
  createStoryError,
  describeStoryError,
  type StoryError,
} from "./StoryErrors";
import { matchesChoice, sanitize } from "./StoryInput";
import {
  findBlock,
  findDuplicateBlockNames,
  parseDocument,
  splitDocumentLines,
} from "./StoryParser";
import {
  SeamType,
  type OP,
  type PresentedChoice,
  type StoryAdvanceResult,
  type StoryBlock,
  type StoryContext,
  type StoryDocument,
  type StoryEnvironment,
  type StoryOptions,
  type StorySession,
  type StoryTransition,
} from "./StoryTypes";
import { isBlank } from "../TextHelpers";

type DocumentResult =
  | { ok: true; document: StoryDocument }
  | { ok: false; error: StoryError };

// What happened after entering one block
type BlockOutcome =
  | { type: "next"; transition: StoryTransition }
  | { type: "input" }
  | { type: "end"; reason: string | null };

export function createSession(
  identity: string,
  env: StoryEnvironment = createEnvironment(identity)
): StorySession {
  return {
    env,
    document: null,
    awaiting: null,
    pending: null,
    turn: 0,
  };
}

export function isDocumentTarget(target: string, options: StoryOptions) {
  return target.endsWith(options.documentSuffix);
}

export function loadDocument(name: string, ctx: StoryContext): DocumentResult {
  if (!Object.hasOwn(ctx.cartridge, name)) {
    return { ok: false, error: { kind: "document-not-found", document: name } };
  }
  const parsed = parseDocument(
    splitDocumentLines(ctx.cartridge[name].toString())
  );
  if (!parsed.ok) {
    return parsed;
  }
  if (ctx.options.verbose) {
    const dupes = findDuplicateBlockNames(parsed.blocks);
    if (dupes.length > 0) {
      console.warn(
        chalk.yellow(`Duplicate blocks in ${name}: ${dupes.join(", ")}`)
      );
    }
  }
  return { ok: true, document: { name, blocks: parsed.blocks } };
}

/**
 * Loads the starting document and runs until the first seam. A starting
 * document that is missing or malformed throws; everything after that is
 * reported through the returned ops.
 */
export function startStory(
  session: StorySession,
  ctx: StoryContext,
  start: { document: string; block: string }
): StoryAdvanceResult {
  const loaded = loadDocument(start.document, ctx);
  if (!loaded.ok) {
    throw createStoryError(loaded.error);
  }
  enterDocument(session, loaded.document);
  session.awaiting = null;
  session.pending = {
    type: "block",
    name: start.block,
    applyEffects: true,
    origin: "start",
  };
  return advanceStory(session, null, ctx);
}

export type ResumeResult =
  | { ok: true; result: StoryAdvanceResult }
  | { ok: false; error: StoryError };

/**
 * Swaps in a previously saved environment and re-enters its block. The
 * block's effects were applied before the save, so they are not applied again.
 * If the saved document can't be loaded the session is left untouched.
 */
export function resumeStory(
  session: StorySession,
  env: StoryEnvironment,
  ctx: StoryContext
): ResumeResult {
  const loaded = loadDocument(env.position.document, ctx);
  if (!loaded.ok) {
    return {
      ok: false,
      error: {
        kind: "environment-load-failure",
        identity: env.identity,
        reason: describeStoryError(loaded.error),
      },
    };
  }
  session.env = cloneEnvironment(env);
  enterDocument(session, loaded.document);
  session.awaiting = null;
  session.pending = {
    type: "block",
    name: env.position.block,
    applyEffects: false,
    origin: "start",
  };
  return { ok: true, result: advanceStory(session, null, ctx) };
}

export function advanceStory(
  session: StorySession,
  rawInput: string | null,
  ctx: StoryContext
): StoryAdvanceResult {
  const out: OP[] = [];
  session.turn += 1;

  function done(
    seam: SeamType,
    info: Record<string, string> = {}
  ): StoryAdvanceResult {
    return { seam, ops: out, info, session };
  }

  // Missing blocks and targets end the branch, never the process
  function endBranch(error: StoryError): StoryAdvanceResult {
    const reason = describeStoryError(error);
    console.warn(chalk.yellow(reason));
    out.push({ type: "story-end", reason });
    return done(SeamType.FINISH, { error: reason });
  }

  let next: StoryTransition | null = null;

  if (session.awaiting) {
    const input = sanitize(rawInput ?? "");
    if (isBlank(input)) {
      return done(SeamType.INPUT);
    }
    const picked = session.awaiting.find((choice) =>
      matchesChoice(choice, input, choice.ordinal, ctx.dictionaries)
    );
    if (!picked) {
      out.push({ type: "message", body: MSG_NOT_UNDERSTOOD });
      return done(SeamType.INPUT);
    }
    session.awaiting = null;
    next = followTarget(session, picked.target, ctx.options);
  } else if (session.pending) {
    next = session.pending;
    session.pending = null;
  } else {
    return done(SeamType.FINISH);
  }

  let steps = 0;
  while (next) {
    if (++steps > ctx.options.ream) {
      const reason = `Loop detected: more than ${ctx.options.ream} blocks without input`;
      console.warn(chalk.yellow(reason));
      out.push({ type: "story-error", reason });
      return done(SeamType.ERROR, { reason });
    }

    if (next.type === "document") {
      const loaded = loadDocument(next.name, ctx);
      if (!loaded.ok) {
        const reason = describeStoryError(loaded.error);
        if (loaded.error.kind === "malformed-directive") {
          console.error(chalk.red(`${next.name}: ${reason}`));
          out.push({ type: "story-error", reason: `${next.name}: ${reason}` });
          return done(SeamType.ERROR, { reason });
        }
        return endBranch(loaded.error);
      }
      enterDocument(session, loaded.document);
      next = {
        type: "block",
        name: loaded.document.blocks[0].name,
        applyEffects: true,
        origin: "choice",
      };
      continue;
    }

    const document = session.document;
    const block = document ? findBlock(document.blocks, next.name) : null;
    if (!block) {
      const documentName = document?.name ?? "";
      return endBranch(
        next.origin === "start"
          ? { kind: "block-not-found", block: next.name, document: documentName }
          : { kind: "target-not-found", target: next.name, document: documentName }
      );
    }

    const outcome = runBlock(session, block, next.applyEffects, out, ctx);
    if (outcome.type === "input") {
      return done(SeamType.INPUT);
    }
    if (outcome.type === "end") {
      out.push({ type: "story-end", reason: outcome.reason });
      return done(SeamType.FINISH);
    }
    next = outcome.transition;
  }

  return done(SeamType.FINISH);
}

function enterDocument(session: StorySession, document: StoryDocument) {
  session.document = document;
  session.env.position = { document: document.name, block: "" };
}

function followTarget(
  session: StorySession,
  target: string,
  options: StoryOptions
): StoryTransition {
  setFlag(session.env, SAVED_FLAG, false);
  if (isDocumentTarget(target, options)) {
    return { type: "document", name: target };
  }
  return { type: "block", name: target, applyEffects: true, origin: "choice" };
}

function runBlock(
  session: StorySession,
  block: StoryBlock,
  applyEffects: boolean,
  out: OP[],
  ctx: StoryContext
): BlockOutcome {
  const { env } = session;
  env.position = { ...env.position, block: block.name };

  // Rendering: conditionals see the environment as of block entry
  for (const raw of block.text) {
    const line = resolveLine(raw, env, ctx.options);
    if (line && !isBlank(lineText(line))) {
      out.push({ type: "text", line });
    }
  }

  if (applyEffects) {
    for (const [name, value] of Object.entries(block.flags)) {
      setFlag(env, name, value);
    }
    for (const [name, delta] of Object.entries(block.counters)) {
      updateCounter(env, name, delta);
    }
  }

  if (getFlag(env, GAME_OVER_FLAG)) {
    return { type: "end", reason: MSG_GAME_OVER };
  }

  const presented = filterChoices(block, env, ctx.options);

  if (presented.length === 0) {
    return { type: "end", reason: null };
  }

  if (presented.length === 1) {
    return {
      type: "next",
      transition: followTarget(session, presented[0].target, ctx.options),
    };
  }

  out.push({
    type: "choices",
    choices: presented.map(({ ordinal, display }) => ({
      ordinal,
      label: display,
    })),
  });
  out.push({ type: "get-input" });
  session.awaiting = presented;
  return { type: "input" };
}

export function filterChoices(
  block: StoryBlock,
  env: StoryEnvironment,
  options: StoryOptions
): PresentedChoice[] {
  const presented: PresentedChoice[] = [];
  for (const choice of block.choices) {
    const display = resolveChoiceLabel(choice.label, env, options);
    if (!display) {
      continue;
    }
    presented.push({
      ...choice,
      label: lineText(display),
      ordinal: presented.length + 1,
      display,
    });
  }
  return presented;
}

import {
  BLOCK_PREFIX,
  CHOICE_PREFIX,
  CHOICE_SEPARATOR,
  COUNTER_PREFIX,
  COUNTER_SEPARATOR,
  DEFAULT_BLOCK_NAME,
  FLAG_PREFIX,
  FLAG_SEPARATOR,
  JUMP_PREFIX,
} from "./StoryConstants";
import type { StoryError } from "./StoryErrors";
import type { StoryBlock, StoryChoice } from "./StoryTypes";
import { setOwn } from "../RecordHelpers";
import { isBlank } from "../TextHelpers";

export type ParseResult =
  | { ok: true; blocks: StoryBlock[] }
  | { ok: false; error: StoryError };

const INTEGER_RE = /^[+-]?\d+$/;

export function createBlock(name: string): StoryBlock {
  return { name, text: [], choices: [], flags: {}, counters: {} };
}

export function splitDocumentLines(source: string): string[] {
  const lines = source.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function parseDocument(lines: string[]): ParseResult {
  const blocks: StoryBlock[] = [];
  let current = createBlock(DEFAULT_BLOCK_NAME);
  let seenBlock = false;

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i];
    const lineNumber = i + 1;
    const fail = (reason: string): ParseResult => ({
      ok: false,
      error: { kind: "malformed-directive", line: lineNumber, reason },
    });

    if (text.startsWith(BLOCK_PREFIX)) {
      const name = directiveBody(text, BLOCK_PREFIX);
      if (name === null) {
        return fail(`expected "${BLOCK_PREFIX} name"`);
      }
      // Anything before the first block header is dropped
      if (seenBlock) {
        blocks.push(current);
      }
      seenBlock = true;
      current = createBlock(name);
      continue;
    }

    const reason = parseDirectiveLine(text, current);
    if (reason !== null) {
      return fail(reason);
    }
  }

  blocks.push(current);
  return { ok: true, blocks };
}

// Returns the reason the line is malformed, or null once it has been applied
function parseDirectiveLine(text: string, block: StoryBlock): string | null {
  if (text.startsWith(CHOICE_PREFIX)) {
    const parts = text.split(CHOICE_SEPARATOR);
    if (parts.length !== 3) {
      return `expected "${CHOICE_PREFIX} label -> keywords -> target", found ${parts.length} part(s)`;
    }
    const label = directiveBody(parts[0], CHOICE_PREFIX);
    if (label === null) {
      return "choice label is missing";
    }
    const target = parts[2].trim();
    if (isBlank(target)) {
      return "choice target is missing";
    }
    block.choices.push({ label, keywords: parts[1], target });
    return null;
  }

  if (text.startsWith(JUMP_PREFIX)) {
    const target = directiveBody(text, JUMP_PREFIX);
    if (target === null) {
      return `expected "${JUMP_PREFIX} target"`;
    }
    const choice: StoryChoice = { label: "", keywords: "", target };
    block.choices.push(choice);
    return null;
  }

  if (text.startsWith(FLAG_PREFIX)) {
    const parts = text.split(FLAG_SEPARATOR);
    const name =
      parts.length === 2 ? directiveBody(parts[0], FLAG_PREFIX) : null;
    if (name === null) {
      return `expected "${FLAG_PREFIX} name = true|false"`;
    }
    const value = parts[1].trim();
    if (value !== "true" && value !== "false") {
      return `flag ${name} must be true or false, got "${value}"`;
    }
    setOwn(block.flags, name, value === "true");
    return null;
  }

  if (text.startsWith(COUNTER_PREFIX)) {
    const parts = text.split(COUNTER_SEPARATOR);
    const name =
      parts.length === 2 ? directiveBody(parts[0], COUNTER_PREFIX) : null;
    if (name === null) {
      return `expected "${COUNTER_PREFIX} name + integer"`;
    }
    const value = parts[1].trim();
    if (!INTEGER_RE.test(value)) {
      return `counter ${name} needs an integer, got "${value}"`;
    }
    const delta = parseInt(value, 10);
    if (!Number.isSafeInteger(delta)) {
      return `counter ${name} delta ${value} is out of range`;
    }
    setOwn(block.counters, name, delta);
    return null;
  }

  block.text.push(text);
  return null;
}

// The text after "<prefix> ", or null if the space or the body is missing
function directiveBody(text: string, prefix: string): string | null {
  if (!text.startsWith(`${prefix} `)) {
    return null;
  }
  const body = text.slice(prefix.length + 1).trim();
  return isBlank(body) ? null : body;
}

export function findBlock(
  blocks: StoryBlock[],
  name: string
): StoryBlock | null {
  return blocks.find((block) => block.name === name) ?? null;
}

export function findDuplicateBlockNames(blocks: StoryBlock[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const block of blocks) {
    if (seen.has(block.name)) {
      dupes.add(block.name);
    }
    seen.add(block.name);
  }
  return [...dupes];
}

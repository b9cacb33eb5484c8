import chalk from "chalk";
import {
  BRANCH_SEPARATOR,
  COMPARISON_OPERATORS,
  COUNTER_CONDITION_PREFIX,
  FLAG_CONDITION_PREFIX,
  HIGHLIGHT_PREFIXES,
  PROMPT_COLOR,
  PROMPT_INDENT,
  QUOTE,
} from "./StoryConstants";
import { getCounter, getFlag } from "./StoryEnvironment";
import type {
  StoryEnvironment,
  StoryOptions,
  StyledLine,
  StyledSpan,
  TextColor,
} from "./StoryTypes";

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export type LineNode =
  | { type: "plain"; text: string }
  | { type: "highlight"; color: TextColor; text: string }
  | { type: "flag"; flag: string; then: LineNode; else: LineNode | null }
  | {
      type: "counter";
      counter: string;
      op: ComparisonOperator;
      value: number;
      then: LineNode;
      else: LineNode | null;
    };

type ConditionalNode = Extract<LineNode, { type: "flag" | "counter" }>;
type LeafNode = Extract<LineNode, { type: "plain" | "highlight" }>;

type Condition =
  | { type: "flag"; flag: string }
  | { type: "counter"; counter: string; op: ComparisonOperator; value: number };

const COUNTER_CONDITION_RE = /^#- (\S+) (<=|>=|==|<|>) ([+-]?\d+)\s*$/;
const FLAG_CONDITION_RE = /^\?- (\S+)\s*$/;

export function isConditionalText(text: string): boolean {
  return (
    text.startsWith(FLAG_CONDITION_PREFIX) ||
    text.startsWith(COUNTER_CONDITION_PREFIX)
  );
}

export function compileLine(
  line: string,
  options: Pick<StoryOptions, "maxConditionalDepth" | "verbose">,
  depth: number = 0
): LineNode {
  if (!isConditionalText(line)) {
    return compileLeaf(line);
  }
  if (depth >= options.maxConditionalDepth) {
    warn(options, `Conditional nesting deeper than ${depth}: ${line}`);
    return { type: "plain", text: line };
  }

  const parts = line.split(BRANCH_SEPARATOR);
  const condition = parseCondition(parts[0]);
  if (!condition || parts.length < 2) {
    warn(options, `Malformed conditional rendered as text: ${line}`);
    return { type: "plain", text: line };
  }

  // A nested conditional in the then-branch takes the whole remainder;
  // otherwise anything after the then-branch is the else-branch (else-if chains)
  let thenText: string;
  let elseText: string | null;
  if (isConditionalText(parts[1])) {
    thenText = parts.slice(1).join(BRANCH_SEPARATOR);
    elseText = null;
  } else {
    thenText = parts[1];
    elseText = parts.length > 2 ? parts.slice(2).join(BRANCH_SEPARATOR) : null;
  }

  const thenNode = compileLine(thenText, options, depth + 1);
  const elseNode =
    elseText === null ? null : compileLine(elseText, options, depth + 1);
  return { ...condition, then: thenNode, else: elseNode };
}

function compileLeaf(text: string): LeafNode {
  for (const prefix in HIGHLIGHT_PREFIXES) {
    if (text.startsWith(prefix)) {
      return {
        type: "highlight",
        color: HIGHLIGHT_PREFIXES[prefix],
        text: text.slice(prefix.length),
      };
    }
  }
  return { type: "plain", text };
}

function parseCondition(text: string): Condition | null {
  const flagMatch = FLAG_CONDITION_RE.exec(text);
  if (flagMatch) {
    return { type: "flag", flag: flagMatch[1] };
  }
  const counterMatch = COUNTER_CONDITION_RE.exec(text);
  if (!counterMatch) {
    return null;
  }
  const [, counter, op, literal] = counterMatch;
  const value = parseInt(literal, 10);
  if (!isComparisonOperator(op) || !Number.isSafeInteger(value)) {
    return null;
  }
  return { type: "counter", counter, op, value };
}

function isComparisonOperator(op: string): op is ComparisonOperator {
  return COMPARISON_OPERATORS.some((candidate) => candidate === op);
}

export function evaluatePredicate(
  amount: number,
  op: ComparisonOperator,
  value: number
): boolean {
  switch (op) {
    case "<":
      return amount < value;
    case "<=":
      return amount <= value;
    case "==":
      return amount === value;
    case ">=":
      return amount >= value;
    case ">":
      return amount > value;
  }
}

export function testCondition(
  node: ConditionalNode,
  env: StoryEnvironment
): boolean {
  if (node.type === "flag") {
    return getFlag(env, node.flag);
  }
  return evaluatePredicate(getCounter(env, node.counter), node.op, node.value);
}

export function resolveLine(
  line: string,
  env: StoryEnvironment,
  options: Pick<StoryOptions, "maxConditionalDepth" | "verbose">
): StyledLine | null {
  let node: LineNode | null = compileLine(line, options);
  while (node && (node.type === "flag" || node.type === "counter")) {
    node = testCondition(node, env) ? node.then : node.else;
  }
  return node ? styleLeaf(node) : null;
}

// Choices have no else: a false condition anywhere along the then-path drops the choice
export function resolveChoiceLabel(
  label: string,
  env: StoryEnvironment,
  options: Pick<StoryOptions, "maxConditionalDepth" | "verbose">
): StyledLine | null {
  let node: LineNode = compileLine(label, options);
  while (node.type === "flag" || node.type === "counter") {
    if (!testCondition(node, env)) {
      return null;
    }
    node = node.then;
  }
  return styleLeaf(node);
}

function styleLeaf(node: LeafNode): StyledLine {
  if (node.type === "highlight") {
    return { kind: "narration", spans: styleText(node.text, node.color) };
  }
  if (node.text.startsWith(PROMPT_INDENT)) {
    return {
      kind: "prompt",
      spans: styleText(node.text.trimStart(), PROMPT_COLOR),
    };
  }
  return { kind: "narration", spans: styleText(node.text, "default") };
}

export function styleText(text: string, color: TextColor): StyledSpan[] {
  if (text.length === 0) {
    return [];
  }
  if (color === "default" || text.split(QUOTE).length < 3) {
    return [{ text, color }];
  }
  const spans: StyledSpan[] = [];
  let inQuote = false;
  let buffer = "";
  let bufferColor: TextColor = "default";
  for (const ch of text) {
    let chColor: TextColor;
    if (ch === QUOTE) {
      chColor = color;
      inQuote = !inQuote;
    } else {
      chColor = inQuote ? color : "default";
    }
    if (chColor !== bufferColor && buffer.length > 0) {
      spans.push({ text: buffer, color: bufferColor });
      buffer = "";
    }
    bufferColor = chColor;
    buffer += ch;
  }
  if (buffer.length > 0) {
    spans.push({ text: buffer, color: bufferColor });
  }
  return spans;
}

export function lineText(line: StyledLine): string {
  return line.spans.map((span) => span.text).join("");
}

function warn(options: Pick<StoryOptions, "verbose">, message: string) {
  if (options.verbose) {
    console.warn(chalk.yellow(message));
  }
}

import chalk from "chalk";
import { jitter, sleep } from "../AsyncHelpers";
import type {
  OP,
  StoryOptions,
  StyledLine,
  StyledSpan,
  TextColor,
} from "./StoryTypes";

export const CAROT = "> ";

export type LocalStoryRunnerOptions = StoryOptions & {
  fastMode: boolean;
  lineTimeMs: number;
  typeTimeMs: number;
};

export const DEFAULT_LINE_TIME_MS = 1200;
export const DEFAULT_TYPE_TIME_MS = 24;

export type Painter = chalk.Chalk;

export function paint(
  text: string,
  color: TextColor,
  painter: Painter = chalk
): string {
  switch (color) {
    case "default":
      return text;
    case "purple":
      return painter.magenta(text);
    default:
      return painter[color](text);
  }
}

export function formatSpans(spans: StyledSpan[], painter: Painter = chalk) {
  return spans.map((span) => paint(span.text, span.color, painter)).join("");
}

export function formatLine(line: StyledLine, painter: Painter = chalk) {
  return formatSpans(line.spans, painter);
}

async function typeText(
  spans: StyledSpan[],
  options: LocalStoryRunnerOptions,
  fast: boolean
) {
  if (options.fastMode) {
    console.log(formatSpans(spans));
    return;
  }
  for (const span of spans) {
    for (const ch of span.text) {
      process.stdout.write(paint(ch, span.color));
      await sleep(jitter(options.typeTimeMs));
    }
  }
  process.stdout.write("\n");
  await sleep(fast ? options.lineTimeMs / 2 : options.lineTimeMs);
}

export async function terminalRenderOps(
  ops: OP[],
  options: LocalStoryRunnerOptions
) {
  for (let i = 0; i < ops.length; i++) {
    const op = ops[i];
    switch (op.type) {
      case "get-input":
        break;
      case "text":
        if (op.line.kind === "prompt") {
          console.log();
        }
        await typeText(op.line.spans, options, false);
        break;
      case "choices":
        console.log();
        for (const choice of op.choices) {
          await typeText(
            [
              { text: `${choice.ordinal}) `, color: "default" },
              ...choice.label.spans,
            ],
            options,
            true
          );
        }
        console.log();
        break;
      case "message":
        await typeText([{ text: op.body, color: "default" }], options, true);
        break;
      case "story-end":
        console.log(
          chalk.magenta.italic(op.reason ? `[end] ${op.reason}` : "[end]")
        );
        return;
      case "story-error":
        console.log(chalk.red.italic(`[error] ${op.reason}`));
        return;
    }
  }
}

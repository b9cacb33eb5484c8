import chalk from "chalk";
import readline from "readline";
import type { ControlContext } from "./StoryControls";
import { PROMPT_COLOR } from "./StoryConstants";
import {
  CAROT,
  terminalRenderOps,
  type LocalStoryRunnerOptions,
} from "./StoryLocalRunnerUtils";
import { runInteractive } from "./StoryRunnerCore";
import type { EnvironmentStore } from "./StoryRepo";
import type {
  StoryAdvanceResult,
  StoryContext,
  StorySession,
} from "./StoryTypes";

export type LineReader = {
  next: () => Promise<string | null>;
};

export function createLineReader(rl: readline.Interface): LineReader {
  const queue: string[] = [];
  const waiters: ((line: string | null) => void)[] = [];
  let closed = false;

  rl.on("line", (line) => {
    const waiter = waiters.shift();
    if (waiter) {
      waiter(line);
    } else {
      queue.push(line);
    }
  });
  rl.on("close", () => {
    closed = true;
    for (const waiter of waiters.splice(0)) {
      waiter(null);
    }
  });

  return {
    next() {
      const queued = queue.shift();
      if (queued !== undefined) {
        return Promise.resolve(queued);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => waiters.push(resolve));
    },
  };
}

export async function instantiateREPL(
  first: StoryAdvanceResult,
  session: StorySession,
  story: StoryContext,
  store: EnvironmentStore,
  options: LocalStoryRunnerOptions
): Promise<StoryAdvanceResult> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: chalk.greenBright(CAROT),
  });
  const reader = createLineReader(rl);

  const render: ControlContext["render"] = (ops) =>
    terminalRenderOps(ops, options);

  try {
    return await runInteractive(first, {
      session,
      story,
      store,
      render,
      readLine: reader.next,
      beforePrompt: () => rl.prompt(),
      ask: async (question) => {
        await render([
          {
            type: "text",
            line: {
              kind: "prompt",
              spans: [{ text: question, color: PROMPT_COLOR }],
            },
          },
        ]);
        rl.prompt();
        return reader.next();
      },
    });
  } finally {
    rl.close();
  }
}

import chalk from "chalk";
import { compact, last } from "lodash";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadEnv } from "../env";
import { loadDirRecursive } from "../lib/FileUtils";
import { createSession } from "../lib/engine/StoryEngine";
import { formatEnvironment } from "../lib/engine/StoryEnvironment";
import { isStoryError } from "../lib/engine/StoryErrors";
import { createDictionaryLookup } from "../lib/engine/StoryInput";
import {
  DEFAULT_LINE_TIME_MS,
  DEFAULT_TYPE_TIME_MS,
  type LocalStoryRunnerOptions,
} from "../lib/engine/StoryLocalRunnerUtils";
import { instantiateREPL } from "../lib/engine/StoryREPLUtils";
import { openStory } from "../lib/engine/StoryRunnerCore";
import {
  DEFAULT_SAVE_DIR,
  FileEnvironmentStore,
} from "../lib/engine/StoryRepo";
import {
  DEFAULT_STORY_OPTIONS,
  type StoryContext,
} from "../lib/engine/StoryTypes";

const env = loadEnv();

async function runPlay() {
  const argv = await yargs(hideBin(process.argv))
    .option("cartridgeDir", {
      type: "string",
      description: "Path to the dir containing the story files",
      demandOption: true,
    })
    .option("start", {
      type: "string",
      description: "Story file to begin with",
      default: "start.txt",
    })
    .option("block", {
      type: "string",
      description: "Block to begin with",
      default: "start",
    })
    .option("name", {
      type: "string",
      description: "Name of the game, used as the save slot",
    })
    .option("saveDir", {
      type: "string",
      description: "Directory for save files",
      default: env.FORKLINE_SAVE_DIR ?? DEFAULT_SAVE_DIR,
    })
    .option("resume", {
      type: "boolean",
      description: "Continue from the saved game if there is one",
      default: false,
    })
    .option("fast", {
      type: "boolean",
      description: "Print text instantly instead of typing it out",
      default: env.FORKLINE_FAST,
    })
    .option("verbose", {
      type: "boolean",
      description: "Verbose logging",
      default: env.FORKLINE_VERBOSE,
    })
    .parserConfiguration({
      "camel-case-expansion": true,
      "strip-aliased": true,
    })
    .help()
    .parse();

  const gameId = argv.name ?? last(compact(argv.cartridgeDir.split("/"))) ?? "story";
  const cartridge = await loadDirRecursive(argv.cartridgeDir);

  const runnerOptions: LocalStoryRunnerOptions = {
    ...DEFAULT_STORY_OPTIONS,
    verbose: argv.verbose,
    fastMode: argv.fast,
    lineTimeMs: DEFAULT_LINE_TIME_MS,
    typeTimeMs: DEFAULT_TYPE_TIME_MS,
  };

  const story: StoryContext = {
    cartridge,
    dictionaries: createDictionaryLookup(),
    options: runnerOptions,
  };
  const store = new FileEnvironmentStore(argv.saveDir);
  const session = createSession(gameId);

  const { result: first, notice } = openStory(
    session,
    story,
    store,
    { document: argv.start, block: argv.block },
    argv.resume
  );
  if (notice) {
    console.warn(chalk.yellow(notice));
  }

  await instantiateREPL(first, session, story, store, runnerOptions);

  if (argv.verbose) {
    console.info(
      chalk.gray(`\nGame State:\n${formatEnvironment(session.env)}`)
    );
  }
}

runPlay().catch((err) => {
  if (isStoryError(err)) {
    console.error(chalk.red(`Couldn't start story: ${err.message}`));
  } else {
    console.error(chalk.red(err));
  }
  process.exitCode = 1;
});

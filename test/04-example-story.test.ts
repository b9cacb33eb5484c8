import { join } from "path";
import { loadDirRecursive } from "../lib/FileUtils";
import { getCounter, getFlag } from "../lib/engine/StoryEnvironment";
import { SeamType } from "../lib/engine/StoryTypes";
import { expect, renderedText, runTestStory } from "./TestUtils";

const START_TEXT = [
  "The ferry leaves you on the pier just as the fog rolls in.",
  "Up on the cliff the old lighthouse is dark for the first time in forty years.",
  '"Someone has to go up and see," the ferryman calls over the engine. "Not me, though."',
  "What do you do?",
];

const DOOR_TEXT = "The lighthouse door is bolted with a heavy padlock.";

async function test() {
  const cartridge = await loadDirRecursive(
    join(__dirname, "..", "stories", "lighthouse")
  );
  expect(Object.keys(cartridge).sort(), ["start.txt", "tower.txt"]);
  const start = { document: "start.txt", block: "start" };

  // Test 1: Finding the key and lighting the lamp
  {
    const { ops, seam, session } = runTestStory(
      cartridge,
      ["search shed", "climb", "yes"],
      { start }
    );
    expect(renderedText(ops), [
      ...START_TEXT,
      "The shed smells of tar and old rope. On a nail by the door hangs a brass key.",
      "You pocket the key.",
      "The key is cold against your leg.",
      "Where to now?",
      "The path is steep and slick. Halfway up you stop to catch your breath.",
      "You are glad you took a moment in the shed to get your bearings.",
      DOOR_TEXT,
      "The brass key turns with a satisfying click.",
      "Do you go in?",
      "The spiral stair winds up into the dark.",
      "At the top the great lens sits cold and silent.",
      "You find the switch, and the beam sweeps out across the water.",
    ]);
    expect(ops[ops.length - 1], { type: "story-end", reason: "Game over." });
    expect(seam, SeamType.FINISH);
    expect(session.env.position, { document: "tower.txt", block: "lamp" });
    expect(getCounter(session.env, "score"), 35);
    expect(getFlag(session.env, "has_key"), true);
  }

  // Test 2: Without the key the door stays shut
  {
    const { ops, seam, session } = runTestStory(
      cartridge,
      ["climb", "knock", "nope"],
      { start }
    );
    const door = [DOOR_TEXT, "The padlock will not budge.", "Do you go in?"];
    expect(renderedText(ops), [
      ...START_TEXT,
      "The path is steep and slick. Halfway up you stop to catch your breath.",
      "You wish you had a better plan.",
      ...door,
      "You knock. Somewhere above, something knocks back.",
      ...door,
      ...START_TEXT,
    ]);
    expect(seam, SeamType.INPUT);
    expect(session.env.position, { document: "start.txt", block: "start" });
    expect(getFlag(session.env, "heard_knock"), true);
    expect(getCounter(session.env, "score"), 5);
  }

  // Test 3: Taking the ferry back
  {
    const { ops, seam } = runTestStory(cartridge, ["back"], { start });
    expect(renderedText(ops).slice(START_TEXT.length), [
      "You climb back aboard. The light stays dark behind you.",
      "Some stories are better left unread.",
    ]);
    expect(ops[ops.length - 1], { type: "story-end", reason: null });
    expect(seam, SeamType.FINISH);
  }

  console.log("✓ 04-example-story.test.ts passed");
}

test().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});

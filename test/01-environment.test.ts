import {
  addScore,
  cloneEnvironment,
  createEnvironment,
  formatEnvironment,
  getCounter,
  getFlag,
  setFlag,
  setPosition,
  updateCounter,
} from "../lib/engine/StoryEnvironment";
import { expect } from "./TestUtils";

async function test() {
  // Test 1: Fresh environments
  {
    const env = createEnvironment("Test_Game");
    expect(env.identity, "Test_Game");
    expect(env.position, { document: "", block: "" });
    expect(env.flags, {});
    expect(env.counters, { score: 0 });
  }

  // Test 2: Unset names read as false and zero
  {
    const env = createEnvironment("Test_Game");
    expect(getFlag(env, "not_set"), false);
    expect(getFlag(env, "constructor"), false);
    expect(getCounter(env, "not_set"), 0);
    expect(getCounter(env, "toString"), 0);
  }

  // Test 3: Flags overwrite, counters accumulate
  {
    const env = createEnvironment("Test_Game");
    setFlag(env, "test", true);
    expect(getFlag(env, "test"), true);
    setFlag(env, "test", false);
    expect(getFlag(env, "test"), false);

    updateCounter(env, "gold", 50);
    updateCounter(env, "gold", -50);
    expect(getCounter(env, "gold"), 0);

    addScore(env, 50);
    expect(getCounter(env, "score"), 50);
    updateCounter(env, "score", 50);
    updateCounter(env, "score", -50);
    expect(getCounter(env, "score"), 50);
  }

  // Test 4: Clones are independent
  {
    const env = createEnvironment("Test_Game");
    setPosition(env, "start.txt", "cliff");
    const copy = cloneEnvironment(env);
    setFlag(copy, "test", true);
    addScore(copy, 5);
    copy.position.block = "shed";
    expect(getFlag(env, "test"), false);
    expect(getCounter(env, "score"), 0);
    expect(env.position, { document: "start.txt", block: "cliff" });
  }

  // Test 5: Prototype-named keys are ordinary names
  {
    const env = createEnvironment("Test_Game");
    setFlag(env, "__proto__", true);
    updateCounter(env, "__proto__", 5);
    updateCounter(env, "__proto__", 3);
    expect(getFlag(env, "__proto__"), true);
    expect(getCounter(env, "__proto__"), 8);
    expect(Object.keys(env.flags), ["__proto__"]);
    expect(Object.getPrototypeOf(env.flags) === Object.prototype, true);

    const copy = cloneEnvironment(env);
    expect(getFlag(copy, "__proto__"), true);
    expect(getCounter(copy, "__proto__"), 8);
    expect(JSON.stringify(copy.counters), '{"score":0,"__proto__":8}');
  }

  // Test 6: State dump
  {
    const env = createEnvironment("Test_Game");
    setPosition(env, "start.txt", "cliff");
    setFlag(env, "test", false);
    addScore(env, 50);
    updateCounter(env, "gold", 0);
    expect(
      formatEnvironment(env),
      [
        "  Name: Test_Game",
        "  Progress: [Story: start.txt, Block: cliff]",
        '  Flags: {"test":false}',
        '  Counters: {"score":50,"gold":0}',
      ].join("\n")
    );
  }

  console.log("✓ 01-environment.test.ts passed");
}

test().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});

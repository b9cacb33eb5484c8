import { readFileSync } from "fs";
import { join } from "path";
import { DEFAULT_BLOCK_NAME } from "../lib/engine/StoryConstants";
import {
  findBlock,
  findDuplicateBlockNames,
  parseDocument,
  splitDocumentLines,
  type ParseResult,
} from "../lib/engine/StoryParser";
import type { StoryBlock } from "../lib/engine/StoryTypes";
import { expect } from "./TestUtils";

function blocksOf(result: ParseResult): StoryBlock[] {
  if (!result.ok) {
    throw new Error(`Unexpected parse failure: ${JSON.stringify(result.error)}`);
  }
  return result.blocks;
}

function errorOf(result: ParseResult) {
  return result.ok ? null : result.error;
}

async function test() {
  // Test 1: Fixture with two block headers
  {
    const source = readFileSync(join(__dirname, "fxt", "test.txt")).toString();
    const blocks = blocksOf(parseDocument(splitDocumentLines(source)));
    expect(blocks.length, 2);
    expect(blocks[0], {
      name: "start",
      text: ["", "Pick a test.", ""],
      choices: [
        { label: "Test one", keywords: "one first", target: "test_1" },
        { label: "Test two", keywords: "two second", target: "test_2" },
      ],
      flags: { test_condition: true },
      counters: { score: 5 },
    });
    expect(blocks[1], {
      name: "test_1",
      text: [
        "",
        "You picked test 1!",
        "?- impossible_condition => this should never be seen",
        "?- test_condition => #- score >= 50 => well done => keep trying",
        "",
      ],
      choices: [{ label: "", keywords: "", target: "test_5" }],
      flags: { test_condition: false },
      counters: {},
    });
  }

  // Test 2: No header yields a single default block
  {
    const blocks = blocksOf(parseDocument(["Hello", "-> end"]));
    expect(blocks, [
      {
        name: DEFAULT_BLOCK_NAME,
        text: ["Hello"],
        choices: [{ label: "", keywords: "", target: "end" }],
        flags: {},
        counters: {},
      },
    ]);
    expect(blocksOf(parseDocument([])).map((b) => b.name), [
      DEFAULT_BLOCK_NAME,
    ]);
  }

  // Test 3: Lines before the first header are dropped
  {
    const blocks = blocksOf(parseDocument(["stray", "-> nowhere", ":- a", "x"]));
    expect(blocks.length, 1);
    expect(blocks[0].name, "a");
    expect(blocks[0].text, ["x"]);
    expect(blocks[0].choices, []);
  }

  // Test 4: Negative counters, repeated keys and jump targets
  {
    const blocks = blocksOf(
      parseDocument([
        ":- a",
        "+- score + -50",
        "=- lit = true",
        "=- lit = false",
        "-> other.txt",
      ])
    );
    expect(blocks[0].counters, { score: -50 });
    expect(blocks[0].flags, { lit: false });
    expect(blocks[0].choices, [
      { label: "", keywords: "", target: "other.txt" },
    ]);
  }

  // Test 5: Malformed directives carry line numbers
  {
    expect(errorOf(parseDocument(["", ":- a", "=- lit = maybe"])), {
      kind: "malformed-directive",
      line: 3,
      reason: 'flag lit must be true or false, got "maybe"',
    });
    expect(errorOf(parseDocument(["+- gold + lots"])), {
      kind: "malformed-directive",
      line: 1,
      reason: 'counter gold needs an integer, got "lots"',
    });
    expect(errorOf(parseDocument([":- a", "*- Only label -> target"])), {
      kind: "malformed-directive",
      line: 2,
      reason: 'expected "*- label -> keywords -> target", found 2 part(s)',
    });
    expect(errorOf(parseDocument([":-"])), {
      kind: "malformed-directive",
      line: 1,
      reason: 'expected ":- name"',
    });
    expect(errorOf(parseDocument(["->"])), {
      kind: "malformed-directive",
      line: 1,
      reason: 'expected "-> target"',
    });
    expect(errorOf(parseDocument(["=- flag true"])), {
      kind: "malformed-directive",
      line: 1,
      reason: 'expected "=- name = true|false"',
    });
    expect(errorOf(parseDocument(["*- Go ->  -> "])), {
      kind: "malformed-directive",
      line: 1,
      reason: "choice target is missing",
    });
  }

  // Test 6: Prototype-named effects and out-of-range deltas
  {
    const [block] = blocksOf(
      parseDocument([":- a", "=- __proto__ = true", "+- __proto__ + 3"])
    );
    expect(Object.keys(block.flags), ["__proto__"]);
    expect(Object.keys(block.counters), ["__proto__"]);
    expect(Object.entries(block.flags), [["__proto__", true]]);
    expect(Object.entries(block.counters), [["__proto__", 3]]);

    expect(errorOf(parseDocument(["+- gold + 99999999999999999999"])), {
      kind: "malformed-directive",
      line: 1,
      reason: "counter gold delta 99999999999999999999 is out of range",
    });
    expect(blocksOf(parseDocument(["+- gold + -9007199254740991"]))[0].counters, {
      gold: -9007199254740991,
    });
  }

  // Test 7: Duplicate names resolve to the first block
  {
    const blocks = blocksOf(parseDocument([":- a", "one", ":- a", "two"]));
    expect(findDuplicateBlockNames(blocks), ["a"]);
    expect(findBlock(blocks, "a")?.text, ["one"]);
    expect(findBlock(blocks, "A"), null);
  }

  // Test 8: Line splitting
  {
    expect(splitDocumentLines("a\r\nb\n"), ["a", "b"]);
    expect(splitDocumentLines("a\n\n"), ["a", ""]);
    expect(splitDocumentLines(""), []);
  }

  console.log("✓ 01-parse.test.ts passed");
}

test().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});

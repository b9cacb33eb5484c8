import chalk from "chalk";
import { z } from "zod";
import dictionaryData from "./data/dictionaries.json";
import { DICTIONARY_MARKER } from "./StoryConstants";
import type { DictionaryLookup, StoryChoice } from "./StoryTypes";

export type Answer = "yes" | "no" | "unsure";

const ZDictionaries = z.record(z.string(), z.array(z.string()));

export type Dictionaries = z.infer<typeof ZDictionaries>;

export const DEFAULT_DICTIONARIES: Dictionaries =
  ZDictionaries.parse(dictionaryData);

const ANSWER_DICTIONARIES: [string, Answer][] = [
  ["AFFIRMATIVES", "yes"],
  ["NEGATIVES", "no"],
  ["UNSURATIVES", "unsure"],
];

export function sanitize(raw: string): string {
  return raw
    .replace(/[^\p{L}\p{N} ]/gu, "")
    .trim()
    .toLowerCase();
}

export function createDictionaryLookup(
  dictionaries: Dictionaries = DEFAULT_DICTIONARIES
): DictionaryLookup {
  const sets = new Map<string, Set<string>>();
  for (const [name, words] of Object.entries(dictionaries)) {
    sets.set(name, new Set(words));
  }
  return {
    isMember(dictionary: string, text: string) {
      return sets.get(dictionary)?.has(text) ?? false;
    },
  };
}

export function dictionaryName(keywords: string): string | null {
  return keywords.startsWith(DICTIONARY_MARKER)
    ? keywords.slice(DICTIONARY_MARKER.length).trim()
    : null;
}

export function matchesChoice(
  choice: StoryChoice,
  input: string,
  ordinal: number,
  dictionaries: DictionaryLookup
): boolean {
  if (
    sanitize(choice.label) === input ||
    choice.target === input ||
    String(ordinal) === input ||
    choice.keywords.includes(input)
  ) {
    return true;
  }
  const name = dictionaryName(choice.keywords);
  return name !== null && dictionaries.isMember(name, input);
}

export function parseAnswer(
  input: string,
  dictionaries: DictionaryLookup,
  verbose: boolean = false
): Answer | null {
  const hit = ANSWER_DICTIONARIES.find(([name]) =>
    dictionaries.isMember(name, input)
  );
  const parsed = hit ? hit[1] : null;
  if (verbose) {
    console.info(chalk.gray(`Input: ${input}, Parsed: Answer->${parsed}`));
  }
  return parsed;
}

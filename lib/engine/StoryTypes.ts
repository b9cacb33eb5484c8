export type StoryCartridge = Record<string, Buffer | string>;

export type StoryChoice = {
  label: string; // may lead with a ?- or #- conditional (then-branch only)
  keywords: string; // substring field, or "@NAME" for a dictionary
  target: string; // block name, or a document name ending in the document suffix
};

export type StoryBlock = {
  name: string;
  text: string[];
  choices: StoryChoice[];
  flags: Record<string, boolean>;
  counters: Record<string, number>;
};

export type StoryDocument = {
  name: string;
  blocks: StoryBlock[];
};

export type StoryPosition = {
  document: string;
  block: string;
};

export type StoryEnvironment = {
  identity: string;
  position: StoryPosition;
  flags: Record<string, boolean>;
  counters: Record<string, number>;
};

export type TextColor =
  | "default"
  | "yellow"
  | "blue"
  | "green"
  | "red"
  | "cyan"
  | "purple";

export type StyledSpan = {
  text: string;
  color: TextColor;
};

export type StyledLine = {
  kind: "narration" | "prompt";
  spans: StyledSpan[];
};

export type PresentedChoice = StoryChoice & {
  ordinal: number;
  display: StyledLine;
};

export type StoryTransition =
  | { type: "block"; name: string; applyEffects: boolean; origin: "start" | "choice" }
  | { type: "document"; name: string };

export type StorySession = {
  env: StoryEnvironment;
  document: StoryDocument | null;
  awaiting: PresentedChoice[] | null;
  pending: StoryTransition | null;
  turn: number;
};

export type OP =
  | { type: "text"; line: StyledLine }
  | {
      type: "choices";
      choices: { ordinal: number; label: StyledLine }[];
    }
  | { type: "get-input" }
  | { type: "message"; body: string }
  | { type: "story-end"; reason: string | null }
  | { type: "story-error"; reason: string };

export enum SeamType {
  INPUT = "input", // Caller is expected to send player input in the next call
  ERROR = "error", // Error was encountered, could not continue
  FINISH = "finish", // Story was completed
}

export type StoryAdvanceResult = {
  seam: SeamType;
  ops: OP[];
  info: Record<string, string>;
  session: StorySession;
};

export type StoryOptions = {
  verbose: boolean;
  ream: number; // max blocks entered per advance before we call it a loop
  maxConditionalDepth: number;
  documentSuffix: string;
};

export const DEFAULT_STORY_OPTIONS: StoryOptions = {
  verbose: false,
  ream: 1000,
  maxConditionalDepth: 16,
  documentSuffix: ".txt",
};

export interface DictionaryLookup {
  isMember(dictionary: string, text: string): boolean;
}

export interface StoryContext {
  cartridge: StoryCartridge;
  dictionaries: DictionaryLookup;
  options: StoryOptions;
}

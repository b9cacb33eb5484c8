import type { TextColor } from "./StoryTypes";

export const BLOCK_PREFIX = ":-";
export const CHOICE_PREFIX = "*-";
export const JUMP_PREFIX = "->";
export const FLAG_PREFIX = "=-";
export const COUNTER_PREFIX = "+-";
export const FLAG_CONDITION_PREFIX = "?-";
export const COUNTER_CONDITION_PREFIX = "#-";

export const CHOICE_SEPARATOR = " -> ";
export const FLAG_SEPARATOR = " = ";
export const COUNTER_SEPARATOR = " + ";
export const BRANCH_SEPARATOR = " => ";

export const PROMPT_INDENT = "  ";
export const QUOTE = '"';

export const HIGHLIGHT_PREFIXES: Record<string, TextColor> = {
  "-y ": "yellow",
  "-b ": "blue",
  "-g ": "green",
  "-r ": "red",
  "-c ": "cyan",
  "-p ": "purple",
};

export const PROMPT_COLOR: TextColor = "cyan";

export const COMPARISON_OPERATORS = ["<", "<=", "==", ">=", ">"] as const;

export const DICTIONARY_MARKER = "@";

export const DEFAULT_BLOCK_NAME = "__default__";

export const SCORE_COUNTER = "score";
export const SAVED_FLAG = "saved";
export const GAME_OVER_FLAG = "game_over";

export const MSG_NOT_UNDERSTOOD = "I didn't understand that.";
export const MSG_SAVED = "Game Saved!";
export const MSG_LOADED = "Game Loaded!";
export const MSG_NO_SAVE = "No save data found";
export const MSG_SAVE_FIRST = "Do you want to save first?";
export const MSG_AUTO_SAVE = "I'll just save for you...";
export const MSG_GOODBYE = "See you next time!";
export const MSG_GAME_OVER = "Game over.";

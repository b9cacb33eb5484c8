export type StoryError =
  | { kind: "malformed-directive"; line: number; reason: string }
  | { kind: "document-not-found"; document: string }
  | { kind: "block-not-found"; block: string; document: string }
  | { kind: "target-not-found"; target: string; document: string }
  | { kind: "environment-not-found"; identity: string }
  | { kind: "environment-load-failure"; identity: string; reason: string }
  | { kind: "environment-save-failure"; identity: string; reason: string };

const STORY_ERROR_NAME = "StoryError";

export type StoryFailure = Error & { story: StoryError };

export function isStoryError(err: unknown): err is StoryFailure {
  return (
    err instanceof Error &&
    err.name === STORY_ERROR_NAME &&
    typeof (err as Partial<StoryFailure>).story !== "undefined"
  );
}

export function createStoryError(error: StoryError): StoryFailure {
  const err = new Error(describeStoryError(error)) as StoryFailure;
  err.name = STORY_ERROR_NAME;
  err.story = error;
  return err;
}

export function describeStoryError(error: StoryError): string {
  switch (error.kind) {
    case "malformed-directive":
      return `Malformed directive on line ${error.line}: ${error.reason}`;
    case "document-not-found":
      return `Story file ${error.document} not found`;
    case "block-not-found":
      return `No block named ${error.block} in ${error.document}`;
    case "target-not-found":
      return `Can't find block ${error.target} in ${error.document}`;
    case "environment-not-found":
      return `No save data found for ${error.identity}`;
    case "environment-load-failure":
      return `Couldn't load ${error.identity}: ${error.reason}`;
    case "environment-save-failure":
      return `Couldn't save ${error.identity}: ${error.reason}`;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

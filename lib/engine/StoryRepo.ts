import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { safeJsonParse } from "../JSONHelpers";
import { setOwn } from "../RecordHelpers";
import { slugify } from "../TextHelpers";
import { cloneEnvironment } from "./StoryEnvironment";
import { errorMessage, type StoryError } from "./StoryErrors";
import type { StoryEnvironment } from "./StoryTypes";

export const DEFAULT_SAVE_DIR = join(homedir(), ".forkline", "saves");

export type LoadResult =
  | { ok: true; env: StoryEnvironment }
  | { ok: false; error: StoryError };

export type SaveResult = { ok: true } | { ok: false; error: StoryError };

export interface EnvironmentStore {
  load(identity: string): LoadResult;
  save(env: StoryEnvironment): SaveResult;
}

// z.record drops a "__proto__" key, so entries are checked and copied one by one
function zOwnRecord<T>(value: z.ZodType<T>) {
  return z.unknown().transform((input, ctx) => {
    const out: Record<string, T> = {};
    if (typeof input !== "object" || input === null || Array.isArray(input)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected an object" });
      return z.NEVER;
    }
    for (const [key, item] of Object.entries(input)) {
      const parsed = value.safeParse(item);
      if (!parsed.success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: parsed.error.issues[0]?.message ?? "invalid value",
          path: [key],
        });
        continue;
      }
      setOwn(out, key, parsed.data);
    }
    return out;
  });
}

export const ZStoryEnvironment = z.object({
  identity: z.string(),
  position: z.object({
    document: z.string(),
    block: z.string(),
  }),
  flags: zOwnRecord(z.boolean()),
  counters: zOwnRecord(z.number().int()),
});

export class FileEnvironmentStore implements EnvironmentStore {
  constructor(public dir: string = DEFAULT_SAVE_DIR) {}

  pathFor(identity: string) {
    return join(this.dir, `${slugify(identity)}.json`);
  }

  load(identity: string): LoadResult {
    const abspath = this.pathFor(identity);
    if (!existsSync(abspath)) {
      return { ok: false, error: { kind: "environment-not-found", identity } };
    }
    let raw: string;
    try {
      raw = readFileSync(abspath).toString();
    } catch (err) {
      return this.loadFailure(identity, errorMessage(err));
    }
    const parsed = ZStoryEnvironment.safeParse(safeJsonParse(raw));
    if (!parsed.success) {
      const fields = parsed.error.errors
        .map((err) => err.path.join(".") || "(root)")
        .join(", ");
      return this.loadFailure(identity, `invalid save data at ${fields}`);
    }
    return { ok: true, env: parsed.data };
  }

  save(env: StoryEnvironment): SaveResult {
    try {
      if (!existsSync(this.dir)) {
        mkdirSync(this.dir, { recursive: true });
      }
      writeFileSync(
        this.pathFor(env.identity),
        JSON.stringify(env, null, 2)
      );
      return { ok: true };
    } catch (err) {
      return {
        ok: false,
        error: {
          kind: "environment-save-failure",
          identity: env.identity,
          reason: errorMessage(err),
        },
      };
    }
  }

  private loadFailure(identity: string, reason: string): LoadResult {
    return {
      ok: false,
      error: { kind: "environment-load-failure", identity, reason },
    };
  }
}

export class MemoryEnvironmentStore implements EnvironmentStore {
  saves = new Map<string, StoryEnvironment>();

  load(identity: string): LoadResult {
    const env = this.saves.get(identity);
    if (!env) {
      return { ok: false, error: { kind: "environment-not-found", identity } };
    }
    return { ok: true, env: cloneEnvironment(env) };
  }

  save(env: StoryEnvironment): SaveResult {
    this.saves.set(env.identity, cloneEnvironment(env));
    return { ok: true };
  }
}

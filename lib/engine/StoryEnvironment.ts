import { SCORE_COUNTER } from "./StoryConstants";
import type { StoryEnvironment } from "./StoryTypes";
import { getOwn, setOwn } from "../RecordHelpers";

export function createEnvironment(identity: string): StoryEnvironment {
  return {
    identity,
    position: { document: "", block: "" },
    flags: {},
    counters: { [SCORE_COUNTER]: 0 },
  };
}

// Names like "constructor" must not fall through to Object.prototype
export function getFlag(env: StoryEnvironment, name: string): boolean {
  return getOwn(env.flags, name, false);
}

export function setFlag(env: StoryEnvironment, name: string, value: boolean) {
  setOwn(env.flags, name, value);
}

export function getCounter(env: StoryEnvironment, name: string): number {
  return getOwn(env.counters, name, 0);
}

export function updateCounter(
  env: StoryEnvironment,
  name: string,
  delta: number
) {
  setOwn(env.counters, name, getCounter(env, name) + delta);
}

export function addScore(env: StoryEnvironment, delta: number) {
  updateCounter(env, SCORE_COUNTER, delta);
}

export function setPosition(
  env: StoryEnvironment,
  document: string,
  block: string
) {
  env.position = { document, block };
}

export function cloneEnvironment(env: StoryEnvironment): StoryEnvironment {
  return {
    identity: env.identity,
    position: { ...env.position },
    flags: { ...env.flags },
    counters: { ...env.counters },
  };
}

export function formatEnvironment(env: StoryEnvironment): string {
  return [
    `  Name: ${env.identity}`,
    `  Progress: [Story: ${env.position.document}, Block: ${env.position.block}]`,
    `  Flags: ${JSON.stringify(env.flags)}`,
    `  Counters: ${JSON.stringify(env.counters)}`,
  ].join("\n");
}

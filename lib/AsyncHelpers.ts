export const sleep = (ms: number) =>
  new Promise<void>((r) => setTimeout(r, ms));

// Jittered delay used by the typewriter effect: base * (rand + 0.25)
export function jitter(baseMs: number, rand: () => number = Math.random) {
  return baseMs * (rand() + 0.25);
}

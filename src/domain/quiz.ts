/** Returns an integer in [0, max). */
export type RandomIndex = (max: number) => number;

export const mathRandomIndex: RandomIndex = (max: number): number =>
  Math.floor(Math.random() * max);

/**
 * Draws one candidate uniformly at random, or null when none are left
 * (the quiz is exhausted).
 */
export function pickRandom<T>(
  candidates: readonly T[],
  randomIndex: RandomIndex = mathRandomIndex
): T | null {
  if (candidates.length === 0) return null;
  const i: number = randomIndex(candidates.length);
  if (!Number.isInteger(i) || i < 0 || i >= candidates.length) {
    throw new RangeError(
      `random index ${i} outside [0, ${candidates.length})`
    );
  }
  return candidates[i] ?? null;
}

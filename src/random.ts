import seedrandom from "seedrandom";
import type { RandomSource } from "./common/types";

/** Adapts a `[0, 1)` generator into a die roller. */
export function fromUniform(uniform: () => number): RandomSource {
  return (sides: number): number => Math.floor(uniform() * sides) + 1;
}

export const defaultRandom: RandomSource = fromUniform(Math.random);

/** Reproducible source: the same seed yields the same sequence of draws. */
export function seededRandom(seed: string): RandomSource {
  return fromUniform(seedrandom(seed));
}

/**
 * Replays fixed draws in order, then wraps around. Each draw must fit the die
 * it is used for.
 */
export function scriptedRandom(draws: readonly number[]): RandomSource {
  if (draws.length === 0) throw new RangeError("scriptedRandom needs at least one draw");

  let index = 0;
  return (sides: number): number => {
    const value = draws[index % draws.length];
    index++;
    if (!Number.isInteger(value) || value < 1 || value > sides) {
      throw new RangeError(`Scripted draw ${value} does not fit a d${sides}`);
    }
    return value;
  };
}

import type { DieGroup } from "../dice";

/** Binary operators understood by an expression. */
export type Operator = "+" | "-";

/** Which end of the sorted rolls a keep filter retains. */
export type KeepMode = "highest" | "lowest";

export interface Keep {
  mode: KeepMode;
  count: number;
}

/** One slot of an expression: a value (literal or dice) or an operator. */
export type Component =
  | { kind: "literal"; value: number }
  | { kind: "dice"; group: DieGroup }
  | { kind: "operator"; op: Operator };

export type OperatorComponent = Extract<Component, { kind: "operator" }>;
export type ValueComponent = Exclude<Component, { kind: "operator" }>;

/**
 * Uniform integer source. Returns an independent draw in `[1, sides]` per call.
 */
export type RandomSource = (sides: number) => number;

/** Upper bound on the number of dice across a whole expression. */
export const MAX_TOTAL_DICE = 1000;

/** Parse-time bounds for a single `NdS` term. */
export const MAX_QUANTITY = 99;
export const MAX_SIDES = 100;

import type { Expression, ExpressionSummary, VerboseRoll } from "./expression";

/**
 * Rounds to `digits` significant digits and drops trailing zeros, the way a
 * `%g` conversion does for values of the magnitude dice produce.
 */
export function formatSignificant(value: number, digits = 7): string {
  if (!Number.isFinite(value)) return String(value);
  return String(Number(value.toPrecision(digits)));
}

export function formatSummary(expression: Expression, summary: ExpressionSummary): string {
  return [
    `Information about dice Expression: ${expression}:`,
    `Low: ${summary.min}`,
    `High: ${summary.max}`,
    `EV: ${formatSignificant(summary.ev)}`,
  ].join("\n");
}

/** A grouped roll trace followed by its total. */
export function formatRoll(roll: VerboseRoll): string {
  return `${roll.trace}\n= ${roll.total}`;
}

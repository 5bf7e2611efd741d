import type { Keep } from "./common/types";
import { DieGroup } from "./dice";
import {
  type DiceError,
  ExpectedNumberOrDie,
  ExpectedOperator,
  IncompleteExpression,
  InvalidToken,
  TooManyKept,
  isDiceError,
} from "./errors";
import { Expression } from "./expression";

interface Scanned<T> {
  value: T;
  /** Index just past the scanned text. */
  end: number;
}

interface DieSpec {
  quantity: number;
  sides: number;
  keep?: Keep;
}

export type ParseResult =
  | { ok: true; expression: Expression }
  | { ok: false; error: DiceError };

/**
 * Parse dice notation into an {@link Expression}.
 *
 * Terms are integers (`1`-`999`) or die groups `NdS`, `NdSvK` (keep lowest K)
 * and `NdS^K` (keep highest K) with N up to 99 and S up to 100, separated by
 * `+` or `-`. Whitespace is allowed between terms.
 *
 * An input ending on an operator (or an empty input) parses; evaluating it
 * throws `IncompleteExpression`.
 */
export function parse(input: string): Expression {
  const expression = new Expression();
  let expectValue = true;
  let pos = skipWhitespace(input, 0);

  while (pos < input.length) {
    pos = expectValue
      ? parseValue(input, pos, expression)
      : parseOperator(input, pos, expression);
    expectValue = !expectValue;
    pos = skipWhitespace(input, pos);
  }

  return expression;
}

/** Like {@link parse}, but returns dice errors instead of throwing them. */
export function tryParse(input: string): ParseResult {
  try {
    return { ok: true, expression: parse(input) };
  } catch (error) {
    if (isDiceError(error)) return { ok: false, error };
    throw error;
  }
}

function parseValue(input: string, pos: number, expression: Expression): number {
  // Die groups first: "12d6" must not be read as the integer 12
  const die = scanDieGroup(input, pos);
  if (die) {
    const { quantity, sides, keep } = die.value;
    if (keep && keep.count > quantity) throw new TooManyKept(expression.toString());
    expression.addValue(new DieGroup(quantity, sides, keep));
    return die.end;
  }

  const literal = scanNumber(input, pos, 3);
  if (literal) {
    expression.addValue(literal.value);
    return literal.end;
  }

  const c = input[pos];
  if (c === "+" || c === "-") throw new ExpectedNumberOrDie(expression.toString());
  throw new InvalidToken(expression.toString(), pos, c);
}

function parseOperator(input: string, pos: number, expression: Expression): number {
  const c = input[pos];
  if (c === "+" || c === "-") {
    expression.addOperator(c);
    return pos + 1;
  }

  if (isDigit(c)) throw new ExpectedOperator(expression.toString());
  throw new IncompleteExpression(expression.toString());
}

/** `[1-9][0-9]?` `d` (`100` | `[1-9][0-9]?`), then optionally `v`/`^` and `[1-9][0-9]{0,2}`. */
function scanDieGroup(input: string, pos: number): Scanned<DieSpec> | undefined {
  const quantity = scanNumber(input, pos, 2);
  if (!quantity || input[quantity.end] !== "d") return;

  const sidesAt = quantity.end + 1;
  const sides = input.startsWith("100", sidesAt)
    ? { value: 100, end: sidesAt + 3 }
    : scanNumber(input, sidesAt, 2);
  if (!sides) return;

  const spec: DieSpec = { quantity: quantity.value, sides: sides.value };
  const marker = input[sides.end];
  if (marker === "v" || marker === "^") {
    const count = scanNumber(input, sides.end + 1, 3);
    if (count) {
      spec.keep = { mode: marker === "^" ? "highest" : "lowest", count: count.value };
      return { value: spec, end: count.end };
    }
  }

  return { value: spec, end: sides.end };
}

/** A number with no leading zero and at most `maxDigits` digits. */
function scanNumber(
  input: string,
  pos: number,
  maxDigits: number
): Scanned<number> | undefined {
  const first = input[pos];
  if (!isDigit(first) || first === "0") return;

  let end = pos + 1;
  while (end - pos < maxDigits && isDigit(input[end])) end++;

  return { value: parseInt(input.slice(pos, end), 10), end };
}

function skipWhitespace(input: string, pos: number): number {
  while (pos < input.length && isWhitespace(input[pos])) pos++;
  return pos;
}

function isDigit(c: string | undefined): boolean {
  return c !== undefined && c >= "0" && c <= "9";
}

function isWhitespace(c: string): boolean {
  return c.trim() === "";
}

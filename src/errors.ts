export type DiceErrorCode =
  | "TOO_MANY_DICE"
  | "TOO_MANY_KEPT"
  | "EXPECTED_OPERATOR"
  | "EXPECTED_NUMBER_OR_DIE"
  | "INVALID_TOKEN"
  | "INCOMPLETE_EXPRESSION";

/**
 * Base class for every user-input error raised while building or evaluating
 * an expression. `current` is the canonical form of the expression as far as
 * it had been built when the error was raised.
 */
export class DiceError extends Error {
  constructor(
    readonly code: DiceErrorCode,
    message: string,
    readonly current: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class TooManyDice extends DiceError {
  constructor(current: string, readonly attempted: number) {
    super("TOO_MANY_DICE", "Whoops, too many dice here", current);
  }
}

export class TooManyKept extends DiceError {
  constructor(current: string) {
    super(
      "TOO_MANY_KEPT",
      "You can't keep more dice than you rolled.",
      current
    );
  }
}

export class ExpectedOperator extends DiceError {
  constructor(current: string) {
    super(
      "EXPECTED_OPERATOR",
      `Expected an operator next (Current: ${current})`,
      current
    );
  }
}

export class ExpectedNumberOrDie extends DiceError {
  constructor(
    current: string,
    code: "EXPECTED_NUMBER_OR_DIE" | "INVALID_TOKEN" = "EXPECTED_NUMBER_OR_DIE",
    message = `Expected a number or die next (Current: ${current})`
  ) {
    super(code, message, current);
  }
}

/** Nothing at `position` starts a number or a die group. */
export class InvalidToken extends ExpectedNumberOrDie {
  constructor(
    current: string,
    readonly position: number,
    readonly token: string
  ) {
    super(
      current,
      "INVALID_TOKEN",
      `Unexpected token '${token}' at position ${position} (Current: ${current})`
    );
  }
}

export class IncompleteExpression extends DiceError {
  constructor(current: string) {
    super(
      "INCOMPLETE_EXPRESSION",
      `Incomplete Expression: ${current}`,
      current
    );
  }
}

export function isDiceError(value: unknown): value is DiceError {
  return value instanceof DiceError;
}

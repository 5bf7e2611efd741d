import { describe, expect, it } from "vitest";
import {
  DiceError,
  ExpectedNumberOrDie,
  ExpectedOperator,
  IncompleteExpression,
  InvalidToken,
  TooManyDice,
  TooManyKept,
} from "../src/errors";
import { parse } from "../src/parser";

function parseError(input: string): DiceError {
  try {
    parse(input);
  } catch (error) {
    if (error instanceof DiceError) return error;
    throw error;
  }
  throw new Error(`Expected "${input}" to be rejected`);
}

describe("Parser Error Handling", () => {
  it("rejects a die without a quantity", () => {
    const error = parseError("d6");

    expect(error).toBeInstanceOf(InvalidToken);
    expect(error).toBeInstanceOf(ExpectedNumberOrDie);
    expect(error.code).toBe("INVALID_TOKEN");
    expect(error.current).toBe("");
    expect(error.message).toBe("Unexpected token 'd' at position 0 (Current: )");
  });

  it("reports where an invalid token appears", () => {
    const error = parseError("3d6 + x");

    expect(error).toBeInstanceOf(InvalidToken);
    expect(error.current).toBe("3d6 +");
    if (error instanceof InvalidToken) {
      expect(error.position).toBe(6);
      expect(error.token).toBe("x");
    }
  });

  it("rejects a quantity over two digits", () => {
    // 101 reads as an integer, leaving "d6" where an operator belongs
    const error = parseError("101d6");

    expect(error).toBeInstanceOf(IncompleteExpression);
    expect(error.current).toBe("101");
  });

  it("rejects keeping more dice than rolled", () => {
    expect(parseError("3d6v5")).toBeInstanceOf(TooManyKept);

    const error = parseError("1 + 3d6^4");
    expect(error).toBeInstanceOf(TooManyKept);
    expect(error.current).toBe("1 +");
    expect(error.message).toBe("You can't keep more dice than you rolled.");
  });

  it("rejects more than 1000 dice", () => {
    const input = [...Array(10).fill("99d6"), "11d6"].join(" + ");
    const error = parseError(input);

    expect(error).toBeInstanceOf(TooManyDice);
    expect(error.code).toBe("TOO_MANY_DICE");
    expect(error.message).toBe("Whoops, too many dice here");
    if (error instanceof TooManyDice) expect(error.attempted).toBe(1001);
  });

  it("rejects a value where an operator belongs", () => {
    const error = parseError("3d6 2");

    expect(error).toBeInstanceOf(ExpectedOperator);
    expect(error.current).toBe("3d6");
    expect(error.message).toBe("Expected an operator next (Current: 3d6)");
  });

  it("stops numbers and sides at their maximum width", () => {
    expect(parseError("1000")).toBeInstanceOf(ExpectedOperator);
    expect(parseError("3d1005").current).toBe("3d100");
  });

  it("rejects an operator where a value belongs", () => {
    const error = parseError("+3");

    expect(error).toBeInstanceOf(ExpectedNumberOrDie);
    expect(error).not.toBeInstanceOf(InvalidToken);
    expect(error.code).toBe("EXPECTED_NUMBER_OR_DIE");

    expect(parseError("3d6 + - 2").current).toBe("3d6 +");
  });

  it("rejects leading zeros and zero-sided dice", () => {
    expect(parseError("0")).toBeInstanceOf(InvalidToken);
    expect(parseError("3d0")).toBeInstanceOf(IncompleteExpression);
    expect(parseError("3d06")).toBeInstanceOf(IncompleteExpression);
  });

  it("rejects garbage after a term", () => {
    expect(parseError("3d6x")).toBeInstanceOf(IncompleteExpression);
    expect(parseError("3d6v")).toBeInstanceOf(IncompleteExpression);
    expect(parseError("3D6")).toBeInstanceOf(IncompleteExpression);
    expect(parseError("3d6 * 2").message).toBe("Incomplete Expression: 3d6");
  });
});

import { describe, expect, it } from "vitest";
import { DieGroup } from "../src/dice";
import { ExpectedNumberOrDie, ExpectedOperator, IncompleteExpression } from "../src/errors";
import { EVEngine } from "../src/ev";
import { Expression } from "../src/expression";
import { parse } from "../src/parser";
import { scriptedRandom } from "../src/random";

describe("Expression evaluation", () => {
  it("keeps every roll of NdS within [N, N*S]", () => {
    const cases: Array<[string, number, number]> = [
      ["3d6", 3, 18],
      ["1d20", 1, 20],
      ["10d4", 10, 40],
      ["2d100", 2, 200],
    ];

    for (const [input, low, high] of cases) {
      const expression = parse(input);
      for (let trial = 0; trial < 10000; trial++) {
        const value = expression.roll();
        expect(Number.isInteger(value)).toBe(true);
        expect(value).toBeGreaterThanOrEqual(low);
        expect(value).toBeLessThanOrEqual(high);
      }
    }
  });

  it("folds scripted rolls left to right", () => {
    expect(parse("2d6 + 3").roll(scriptedRandom([4, 5]))).toBe(12);
    expect(parse("10 - 1d4").roll(scriptedRandom([3]))).toBe(7);
    expect(parse("1d8 - 1d8 - 2").roll(scriptedRandom([6, 2]))).toBe(2);
    expect(parse("4d6^3 + 1").roll(scriptedRandom([3, 1, 6, 4]))).toBe(14);
  });

  it("gives N(S+1)/2 as the EV of unfiltered dice", () => {
    expect(parse("3d6").getEV()).toBe(10.5);
    expect(parse("1d20").getEV()).toBe(10.5);
    expect(parse("10d10").getEV()).toBe(55);
    expect(parse("2d6 + 3").getEV()).toBe(10);
  });

  it("bounds 4d6 keep highest 3", () => {
    const expression = parse("4d6^3");

    expect(expression.getMin()).toBe(3);
    expect(expression.getMax()).toBe(18);
    expect(expression.getEV()).toBeCloseTo(12.2446, 4);
  });

  it("keeps the EV between min and max for keep filters", () => {
    for (const input of ["4d6^3", "4d6v3", "2d20^1", "2d20v1", "5d8v2 + 3", "10 - 3d10^2"]) {
      const expression = parse(input);
      expect(expression.getMin()).toBeLessThanOrEqual(expression.getEV());
      expect(expression.getEV()).toBeLessThanOrEqual(expression.getMax());
    }
  });

  it("flips die bounds when subtracting", () => {
    const expression = parse("10 - 2d6");

    expect(expression.getMin()).toBe(-2);
    expect(expression.getMax()).toBe(8);
    expect(expression.getEV()).toBe(3);
  });

  it("combines several groups", () => {
    const expression = parse("4d6^3 + 2d20v1 - 3");

    expect(expression.getMin()).toBe(1);
    expect(expression.getMax()).toBe(35);
    expect(expression.getEV()).toBeCloseTo(16.4195987654321, 10);
    expect(expression.summary()).toEqual({
      min: 1,
      max: 35,
      ev: expression.getEV(),
    });
  });

  it("returns identical EVs on repeated calls", () => {
    const expression = parse("6d10v4 + 4d8^2 - 2");
    const first = expression.getEV();

    expect(expression.getEV()).toBe(first);
    expect(expression.getEV(new EVEngine({ maxEntries: 8 }))).toBe(first);
  });

  it("reports each group's draws in detail", () => {
    const detailed = parse("4d6^3 + 1d4").rollDetailed(scriptedRandom([3, 1, 6, 4, 2]));

    expect(detailed.total).toBe(15);
    expect(detailed.groups).toHaveLength(2);
    expect(detailed.groups[0].kept).toEqual([3, 4, 6]);
    expect(detailed.groups[1].rolls).toEqual([2]);
  });
});

describe("Incomplete expressions", () => {
  it("fails every evaluation when ending on an operator", () => {
    const expression = parse("3d6+");

    expect(() => expression.roll()).toThrow(IncompleteExpression);
    expect(() => expression.getMin()).toThrow(IncompleteExpression);
    expect(() => expression.getMax()).toThrow(IncompleteExpression);
    expect(() => expression.getEV()).toThrow(IncompleteExpression);
    expect(() => expression.verboseRoll()).toThrow(IncompleteExpression);
    expect(() => expression.verboseRollFormatted()).toThrow(IncompleteExpression);
    expect(() => expression.roll()).toThrow("Incomplete Expression: 3d6 +");
  });

  it("fails every evaluation when empty", () => {
    const expression = new Expression();

    expect(() => expression.roll()).toThrow(IncompleteExpression);
    expect(() => expression.getEV()).toThrow("Incomplete Expression: ");
  });

  it("can be completed after a failed evaluation", () => {
    const expression = parse("3d6 -");
    expect(() => expression.getMax()).toThrow(IncompleteExpression);

    expression.addValue(2);
    expect(expression.getMax()).toBe(16);
  });
});

describe("Expression construction", () => {
  it("builds progressively", () => {
    const expression = new Expression()
      .addValue(new DieGroup(3, 6))
      .addOperator("+")
      .addValue(2);

    expect(expression.toString()).toBe("3d6 + 2");
    expect(expression.diceCount).toBe(3);
  });

  it("requires values and operators to alternate", () => {
    const expression = new Expression();
    expect(() => expression.addOperator("+")).toThrow(ExpectedNumberOrDie);

    expression.addValue(1);
    expect(() => expression.addValue(2)).toThrow(ExpectedOperator);

    expression.addOperator("-");
    expect(() => expression.addOperator("+")).toThrow(ExpectedNumberOrDie);
  });

  it("rejects non-integer literals", () => {
    expect(() => new Expression().addValue(1.5)).toThrow(RangeError);
  });

  it("leaves the expression unchanged when a value is rejected", () => {
    const expression = parse([...Array(10).fill("99d6"), "10d6"].join(" + "));
    expression.addOperator("+");

    expect(() => expression.addValue(new DieGroup(1, 6))).toThrow("Whoops, too many dice here");
    expect(expression.diceCount).toBe(1000);
    expression.addValue(5);
    expect(expression.getMin()).toBe(1005);
  });
});

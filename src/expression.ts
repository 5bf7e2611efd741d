import type {
  Component,
  Operator,
  OperatorComponent,
  RandomSource,
  ValueComponent,
} from "./common/types";
import { MAX_TOTAL_DICE } from "./common/types";
import { DieGroup, type DieRoll } from "./dice";
import {
  ExpectedNumberOrDie,
  ExpectedOperator,
  IncompleteExpression,
  TooManyDice,
} from "./errors";
import { defaultEngine, type EVEngine } from "./ev";
import { parse } from "./parser";
import { defaultRandom } from "./random";

export interface VerboseRoll {
  total: number;
  trace: string;
}

export interface DetailedRoll {
  total: number;
  /** One entry per die group, in expression order. */
  groups: DieRoll[];
}

export interface ExpressionSummary {
  min: number;
  max: number;
  ev: number;
}

type RolledValue =
  | { kind: "literal"; value: number }
  | { kind: "dice"; group: DieGroup; roll: DieRoll };

type RolledComponent = RolledValue | OperatorComponent;

const isOperator = <V extends { kind: string }>(
  component: V | OperatorComponent
): component is OperatorComponent => component.kind === "operator";

const apply = (op: Operator, total: number, value: number): number =>
  op === "+" ? total + value : total - value;

/**
 * Left-to-right fold with a pending operator, starting from `+`. `value`
 * receives each value slot together with the operator about to consume it.
 */
function fold<V extends { kind: "literal" | "dice" }>(
  components: readonly (V | OperatorComponent)[],
  value: (component: V, op: Operator) => number
): number {
  let total = 0;
  let op: Operator = "+";

  for (const component of components) {
    if (isOperator(component)) op = component.op;
    else total = apply(op, total, value(component, op));
  }

  return total;
}

function formatComponent(component: Component | RolledComponent): string {
  switch (component.kind) {
    case "literal":
      return String(component.value);
    case "dice":
      return component.group.toString();
    case "operator":
      return component.op;
  }
}

/**
 * An ordered sequence of values (integer literals and die groups) separated by
 * `+`/`-` operators. Alternation and the dice limit are checked as components
 * are added; ending on a value is checked when the expression is evaluated.
 */
export class Expression {
  private readonly parts: Component[] = [];
  private dice = 0;

  /** Parses dice notation such as `3d6 + 2` or `4d6^3 - 1`. */
  static fromString(input: string): Expression {
    return parse(input);
  }

  get components(): readonly Component[] {
    return this.parts;
  }

  get length(): number {
    return this.parts.length;
  }

  /** Total number of dice across every die group. */
  get diceCount(): number {
    return this.dice;
  }

  /** Non-empty and ending on a value. */
  get isComplete(): boolean {
    return this.parts.length % 2 === 1;
  }

  addValue(value: DieGroup | number): this {
    if (this.parts.length % 2 === 1) throw new ExpectedOperator(this.toString());

    if (value instanceof DieGroup) {
      const attempted = this.dice + value.quantity;
      if (attempted > MAX_TOTAL_DICE) throw new TooManyDice(this.toString(), attempted);
      this.dice = attempted;
      this.parts.push({ kind: "dice", group: value });
    } else {
      if (!Number.isInteger(value)) {
        throw new RangeError(`Literal must be an integer, got ${value}`);
      }
      this.parts.push({ kind: "literal", value });
    }

    return this;
  }

  addOperator(op: Operator): this {
    if (this.parts.length % 2 === 0) throw new ExpectedNumberOrDie(this.toString());
    this.parts.push({ kind: "operator", op });
    return this;
  }

  roll(random: RandomSource = defaultRandom): number {
    this.assertComplete();
    return fold<ValueComponent>(this.parts, (component) =>
      component.kind === "literal" ? component.value : component.group.roll(random)
    );
  }

  rollDetailed(random: RandomSource = defaultRandom): DetailedRoll {
    const rolled = this.rollComponents(random);
    const groups: DieRoll[] = [];
    for (const component of rolled) {
      if (component.kind === "dice") groups.push(component.roll);
    }
    return { total: foldRolled(rolled), groups };
  }

  /**
   * Rolls and describes each die group together with the literals and
   * operators that follow it, one line per group:
   *
   * ```
   * 3d6: [4, 2, 5] -> 11 + 2 (13)
   * -
   * 1d4: [3] -> 3 (3)
   * ```
   *
   * The parenthesised subtotal reads the group as written; the operator line
   * before a group says how it combines with the total.
   */
  verboseRoll(random: RandomSource = defaultRandom): VerboseRoll {
    const rolled = this.rollComponents(random);
    const lines: string[] = [];

    for (const group of groupByDice(rolled)) {
      const trailing = group[group.length - 1];
      const body = isOperator(trailing) ? group.slice(0, -1) : group;
      const [head, ...rest] = body;

      let line =
        head.kind === "dice"
          ? `${head.group}: [${head.roll.rolls.join(", ")}] -> ${head.roll.total}`
          : formatComponent(head);
      if (rest.length > 0) line += ` ${rest.map(formatComponent).join(" ")}`;
      lines.push(`${line} (${foldRolled(body)})`);

      if (isOperator(trailing)) lines.push(trailing.op);
    }

    return { total: foldRolled(rolled), trace: lines.join("\n") };
  }

  /**
   * Rolls and writes out every die, the kept dice of filtered groups, and the
   * final total:
   *
   * ```
   * 4d6 (3, 1, 6, 4) -> Highest 3 (3, 4, 6) -> (13)
   * + 2
   * -------------
   * = 15
   * ```
   */
  verboseRollFormatted(random: RandomSource = defaultRandom): VerboseRoll {
    const rolled = this.rollComponents(random);
    const parts: string[] = [];

    for (const component of rolled) {
      switch (component.kind) {
        case "literal":
          parts.push(String(component.value));
          break;
        case "operator":
          parts.push(`\n${component.op} `);
          break;
        case "dice":
          parts.push(describeDieRoll(component.roll));
          break;
      }
    }

    const total = foldRolled(rolled);
    parts.push(`\n-------------\n= ${total}`);
    return { total, trace: parts.join("") };
  }

  // Subtracting a group flips which of its bounds minimizes the total.
  getMin(): number {
    this.assertComplete();
    return fold<ValueComponent>(this.parts, (component, op) => {
      if (component.kind === "literal") return component.value;
      return op === "-" ? component.group.high : component.group.low;
    });
  }

  getMax(): number {
    this.assertComplete();
    return fold<ValueComponent>(this.parts, (component, op) => {
      if (component.kind === "literal") return component.value;
      return op === "-" ? component.group.low : component.group.high;
    });
  }

  /** Exact expected value, computed analytically rather than sampled. */
  getEV(engine: EVEngine = defaultEngine): number {
    this.assertComplete();
    return fold<ValueComponent>(this.parts, (component) =>
      component.kind === "literal" ? component.value : component.group.getEV(engine)
    );
  }

  summary(engine: EVEngine = defaultEngine): ExpressionSummary {
    return { min: this.getMin(), max: this.getMax(), ev: this.getEV(engine) };
  }

  toString(): string {
    return this.parts.map(formatComponent).join(" ");
  }

  private assertComplete(): void {
    if (!this.isComplete) throw new IncompleteExpression(this.toString());
  }

  private rollComponents(random: RandomSource): RolledComponent[] {
    this.assertComplete();
    return this.parts.map((component): RolledComponent =>
      component.kind === "dice"
        ? { kind: "dice", group: component.group, roll: component.group.rollDetailed(random) }
        : component
    );
  }
}

function foldRolled(components: readonly RolledComponent[]): number {
  return fold<RolledValue>(components, (component) =>
    component.kind === "literal" ? component.value : component.roll.total
  );
}

function describeDieRoll(roll: DieRoll): string {
  const { group } = roll;
  const parts = [`${group.quantity}d${group.sides} (${roll.rolls.join(", ")})`];
  if (group.keep) {
    const label = group.keep.mode === "highest" ? "Highest" : "Lowest";
    parts.push(`-> ${label} ${group.keep.count} (${roll.kept.join(", ")})`);
  }
  parts.push(`-> (${roll.total})`);
  return parts.join(" ");
}

/** Splits components so that every group after the first starts at a die group. */
function groupByDice(components: readonly RolledComponent[]): RolledComponent[][] {
  const groups: RolledComponent[][] = [];
  let start = 0;

  components.forEach((component, index) => {
    if (component.kind === "dice" && index !== start) {
      groups.push(components.slice(start, index));
      start = index;
    }
  });
  groups.push(components.slice(start));

  return groups;
}

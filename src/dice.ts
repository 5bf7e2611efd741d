import type { Keep, KeepMode, RandomSource } from "./common/types";
import { MAX_QUANTITY, MAX_SIDES } from "./common/types";
import { defaultEngine, type EVEngine } from "./ev";
import { TooManyKept } from "./errors";
import { defaultRandom } from "./random";

/** Draws of a single die group, in the order they were rolled. */
export interface DieRoll {
  group: DieGroup;
  rolls: number[];
  /** Kept values, ascending. Equal to the sorted rolls when unfiltered. */
  kept: number[];
  total: number;
}

const KEEP_SYMBOL: Record<KeepMode, string> = {
  highest: "^",
  lowest: "v",
};

function assertInRange(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new RangeError(`${name} must be an integer in [1, ${max}], got ${value}`);
  }
}

/**
 * One `NdS` term, optionally keeping the highest (`^K`) or lowest (`vK`) K dice.
 * Immutable once constructed.
 */
export class DieGroup {
  readonly keep?: Readonly<Keep>;

  constructor(
    readonly quantity: number,
    readonly sides: number,
    keep?: Keep
  ) {
    assertInRange("quantity", quantity, MAX_QUANTITY);
    assertInRange("sides", sides, MAX_SIDES);

    if (keep) {
      if (keep.count > quantity) throw new TooManyKept(this.toString());
      assertInRange("keep count", keep.count, quantity);
      this.keep = Object.freeze({ ...keep });
    }
    Object.freeze(this);
  }

  static keepHighest(quantity: number, sides: number, count: number): DieGroup {
    return new DieGroup(quantity, sides, { mode: "highest", count });
  }

  static keepLowest(quantity: number, sides: number, count: number): DieGroup {
    return new DieGroup(quantity, sides, { mode: "lowest", count });
  }

  /** Smallest possible contribution after the keep filter. */
  get low(): number {
    return this.keep ? this.keep.count : this.quantity;
  }

  /** Largest possible contribution after the keep filter. */
  get high(): number {
    return (this.keep ? this.keep.count : this.quantity) * this.sides;
  }

  // Slice bounds as the EV engine reads them
  get keepLow(): number {
    return this.keep?.mode === "lowest" ? this.keep.count : 0;
  }

  get keepHigh(): number {
    return this.keep?.mode === "highest" ? this.keep.count : this.quantity;
  }

  getEV(engine: EVEngine = defaultEngine): number {
    return engine.fastAnalyticEV(
      this.quantity,
      this.sides,
      this.keepLow,
      this.keepHigh
    );
  }

  roll(random: RandomSource = defaultRandom): number {
    return this.rollDetailed(random).total;
  }

  rollDetailed(random: RandomSource = defaultRandom): DieRoll {
    const rolls: number[] = [];
    for (let i = 0; i < this.quantity; i++) rolls.push(random(this.sides));

    const sorted = [...rolls].sort((a, b) => a - b);
    let kept = sorted;
    if (this.keep?.mode === "highest") kept = sorted.slice(sorted.length - this.keep.count);
    else if (this.keep?.mode === "lowest") kept = sorted.slice(0, this.keep.count);

    const total = kept.reduce((sum, value) => sum + value, 0);
    return { group: this, rolls, kept, total };
  }

  equals(other: DieGroup): boolean {
    return (
      this.quantity === other.quantity &&
      this.sides === other.sides &&
      this.keep?.mode === other.keep?.mode &&
      this.keep?.count === other.keep?.count
    );
  }

  toString(): string {
    const base = `${this.quantity}d${this.sides}`;
    return this.keep ? `${base}${KEEP_SYMBOL[this.keep.mode]}${this.keep.count}` : base;
  }
}

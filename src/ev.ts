import { LRUCache } from "./common/lru-cache";

/*
 * Exact expected value of the sum of the best/worst `keep` of `quantity` dice
 * with `sides` faces, from the order statistics of the roll:
 *
 *   E(keep highest Z of XdY) =
 *     sum_{k=0}^{Z-1} sum_{j=1}^{Y} j sum_{l=0}^{k} w(l, j)
 *
 *   E(keep lowest Z of XdY) =
 *     sum_{k=1}^{Z} sum_{j=1}^{Y} j sum_{l=0}^{X-k} w(l, j)
 *
 *   w(l, j) = C(X, l) * (((Y-j)/Y)^l (j/Y)^(X-l) - ((Y-j+1)/Y)^l ((j-1)/Y)^(X-l))
 */

export interface EVEngineOptions {
  /** Max entries kept per memo table. */
  maxEntries?: number;
}

export interface EVCacheStats {
  binomial: number;
  weights: number;
  keepBest: number;
  keepWorst: number;
}

export const DEFAULT_CACHE_ENTRIES = 65536;

function assertCount(name: string, value: number, min = 0): void {
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

/**
 * Owns the memo tables for the analytic EV computation. Entries are pure
 * functions of their keys, so engines can be shared freely or created per caller.
 */
export class EVEngine {
  private readonly binomialCache: LRUCache<string, number>;
  private readonly weightCache: LRUCache<string, number>;
  private readonly bestCache: LRUCache<string, number>;
  private readonly worstCache: LRUCache<string, number>;

  constructor(options: EVEngineOptions = {}) {
    const size = options.maxEntries ?? DEFAULT_CACHE_ENTRIES;
    this.binomialCache = new LRUCache(size);
    this.weightCache = new LRUCache(size);
    this.bestCache = new LRUCache(size);
    this.worstCache = new LRUCache(size);
  }

  /**
   * `C(n, r)`, or 0 when `r` falls outside `[0, n]`.
   *
   * Evaluated exactly with BigInt over `min(r, n - r)` factors and converted
   * once at the end; `C(1000, 500)` is about 2.7e299 and still a finite double.
   */
  binomialCoefficient(n: number, r: number): number {
    assertCount("n", n);
    if (!Number.isInteger(r)) throw new RangeError(`r must be an integer, got ${r}`);
    if (r < 0 || r > n) return 0;

    return this.binomialCache.getOrCompute(`${n},${r}`, () => {
      const k = Math.min(r, n - r);
      let result = 1n;
      for (let t = 0; t < k; t++) {
        // exact: the running product is always C(n, t + 1)
        result = (result * BigInt(n - t)) / BigInt(t + 1);
      }
      return Number(result);
    });
  }

  /** Probability-mass term `w(i, j)` shared by the keep-best and keep-worst sums. */
  orderStatisticWeight(quantity: number, sides: number, i: number, j: number): number {
    assertCount("quantity", quantity);
    assertCount("sides", sides, 1);
    assertCount("i", i);
    if (i > quantity) throw new RangeError(`i must be <= quantity, got ${i}`);
    assertCount("j", j, 1);
    if (j > sides) throw new RangeError(`j must be <= sides, got ${j}`);

    return this.weight(quantity, sides, i, j);
  }

  /** Expected sum of the `keep` highest of `quantity` dice with `sides` faces. */
  evKeepBest(quantity: number, sides: number, keep: number): number {
    this.assertKeep(quantity, sides, keep);

    return this.bestCache.getOrCompute(`${quantity},${sides},${keep}`, () => {
      // running[j] holds sum_{i=0}^{k} w(i, j), extended one term per rank
      const running = new Array<number>(sides + 1).fill(0);
      let total = 0;
      for (let k = 0; k < keep; k++) {
        let rank = 0;
        for (let j = 1; j <= sides; j++) {
          running[j] += this.weight(quantity, sides, k, j);
          rank += j * running[j];
        }
        total += rank;
      }
      return total;
    });
  }

  /** Expected sum of the `keep` lowest of `quantity` dice with `sides` faces. */
  evKeepWorst(quantity: number, sides: number, keep: number): number {
    this.assertKeep(quantity, sides, keep);

    return this.worstCache.getOrCompute(`${quantity},${sides},${keep}`, () => {
      // prefix[k - 1][j] = sum_{i=0}^{quantity-k} w(i, j)
      const prefix: number[][] = [];
      for (let k = 1; k <= keep; k++) prefix.push(new Array<number>(sides + 1).fill(0));

      for (let j = 1; j <= sides; j++) {
        let sum = 0;
        for (let i = 0; i <= quantity - 1; i++) {
          sum += this.weight(quantity, sides, i, j);
          const k = quantity - i;
          if (k <= keep) prefix[k - 1][j] = sum;
        }
      }

      let total = 0;
      for (let k = 1; k <= keep; k++) {
        let rank = 0;
        for (let j = 1; j <= sides; j++) rank += j * prefix[k - 1][j];
        total += rank;
      }
      return total;
    });
  }

  /**
   * EV of one die group given the slice bounds of its keep filter:
   * `high < quantity` keeps the best `high`, `low > 0` keeps the worst `low`,
   * anything else keeps every die.
   */
  fastAnalyticEV(quantity: number, sides: number, low: number, high: number): number {
    assertCount("quantity", quantity);
    assertCount("sides", sides, 1);
    assertCount("low", low);
    assertCount("high", high);

    if (high < quantity) return this.evKeepBest(quantity, sides, high);
    if (low > 0) return this.evKeepWorst(quantity, sides, low);
    return (quantity * (sides + 1)) / 2;
  }

  stats(): EVCacheStats {
    return {
      binomial: this.binomialCache.size,
      weights: this.weightCache.size,
      keepBest: this.bestCache.size,
      keepWorst: this.worstCache.size,
    };
  }

  clear(): void {
    this.binomialCache.clear();
    this.weightCache.clear();
    this.bestCache.clear();
    this.worstCache.clear();
  }

  private weight(quantity: number, sides: number, i: number, j: number): number {
    return this.weightCache.getOrCompute(`${quantity},${sides},${i},${j}`, () => {
      const rest = quantity - i;
      const x = ((sides - j) / sides) ** i * (j / sides) ** rest;
      const y = ((sides - j + 1) / sides) ** i * ((j - 1) / sides) ** rest;
      return this.binomialCoefficient(quantity, i) * (x - y);
    });
  }

  private assertKeep(quantity: number, sides: number, keep: number): void {
    assertCount("quantity", quantity);
    assertCount("sides", sides, 1);
    assertCount("keep", keep);
    if (keep > quantity) {
      throw new RangeError(`keep must be <= quantity, got ${keep} of ${quantity}`);
    }
  }
}

/** Engine behind the free functions and `Expression.getEV()` by default. */
export const defaultEngine = new EVEngine();

export function binomialCoefficient(n: number, r: number): number {
  return defaultEngine.binomialCoefficient(n, r);
}

export function orderStatisticWeight(
  quantity: number,
  sides: number,
  i: number,
  j: number
): number {
  return defaultEngine.orderStatisticWeight(quantity, sides, i, j);
}

export function evKeepBest(quantity: number, sides: number, keep: number): number {
  return defaultEngine.evKeepBest(quantity, sides, keep);
}

export function evKeepWorst(quantity: number, sides: number, keep: number): number {
  return defaultEngine.evKeepWorst(quantity, sides, keep);
}

export function fastAnalyticEV(
  quantity: number,
  sides: number,
  low: number,
  high: number
): number {
  return defaultEngine.fastAnalyticEV(quantity, sides, low, high);
}

export { LRUCache } from "./common/lru-cache";
export type {
  Component,
  Keep,
  KeepMode,
  Operator,
  OperatorComponent,
  RandomSource,
  ValueComponent,
} from "./common/types";
export { MAX_QUANTITY, MAX_SIDES, MAX_TOTAL_DICE } from "./common/types";

export { DieGroup } from "./dice";
export type { DieRoll } from "./dice";

export {
  DiceError,
  ExpectedNumberOrDie,
  ExpectedOperator,
  IncompleteExpression,
  InvalidToken,
  TooManyDice,
  TooManyKept,
  isDiceError,
} from "./errors";
export type { DiceErrorCode } from "./errors";

export {
  DEFAULT_CACHE_ENTRIES,
  EVEngine,
  binomialCoefficient,
  defaultEngine,
  evKeepBest,
  evKeepWorst,
  fastAnalyticEV,
  orderStatisticWeight,
} from "./ev";
export type { EVCacheStats, EVEngineOptions } from "./ev";

export { Expression } from "./expression";
export type { DetailedRoll, ExpressionSummary, VerboseRoll } from "./expression";

export { formatRoll, formatSignificant, formatSummary } from "./format";
export { parse, tryParse } from "./parser";
export type { ParseResult } from "./parser";
export { defaultRandom, fromUniform, scriptedRandom, seededRandom } from "./random";

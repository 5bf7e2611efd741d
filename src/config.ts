import { z } from "zod";
import { DEFAULT_CACHE_ENTRIES } from "./ev";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const ConfigSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
  DICEMATH_CACHE_SIZE: z.coerce.number().int().positive().default(DEFAULT_CACHE_ENTRIES),
  DICEMATH_MAX_INPUT: z.coerce.number().int().positive().default(500),
});

export interface Config {
  logLevel: LogLevel;
  /** Max entries per EV memo table. */
  cacheSize: number;
  /** Longest expression the CLI accepts. */
  maxInputLength: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Reads configuration from environment variables, failing on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse({
    LOG_LEVEL: blankToUndefined(env.LOG_LEVEL),
    DICEMATH_CACHE_SIZE: blankToUndefined(env.DICEMATH_CACHE_SIZE),
    DICEMATH_MAX_INPUT: blankToUndefined(env.DICEMATH_MAX_INPUT),
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    cacheSize: parsed.data.DICEMATH_CACHE_SIZE,
    maxInputLength: parsed.data.DICEMATH_MAX_INPUT,
  };
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

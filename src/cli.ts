import type { RandomSource } from "./common/types";
import { ConfigError, loadConfig, type Config } from "./config";
import { isDiceError } from "./errors";
import { EVEngine } from "./ev";
import { formatRoll, formatSummary } from "./format";
import { createCliLogger, type CliLogger } from "./logger";
import { parse } from "./parser";
import { defaultRandom, seededRandom } from "./random";

/**
 * Command line front end: `roll` and `info` over a dice expression.
 *
 * @module cli
 */

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  logger?: CliLogger;
  /** Used for rolls when no `--seed` is given. */
  random?: RandomSource;
}

interface CliArgs {
  command?: string;
  words: string[];
  seed?: string;
  full: boolean;
  help: boolean;
}

const USAGE = [
  "Usage: dicemath <command> [options] <expression>",
  "Commands:",
  "  roll <expression>     Roll the expression and show each die",
  "  info <expression>     Show the minimum, maximum and expected value",
  "  help, -h, --help      Show this help",
  "Options:",
  "  --seed <seed>         Roll with a reproducible random sequence",
  "  --full                Show every die and the kept dice (roll only)",
  "Examples:",
  "  dicemath roll 4d6^3 + 2",
  "  dicemath info 2d20v1 - 3",
].join("\n");

export function printUsage(): void {
  console.log(USAGE);
}

function parseArgs(argv: readonly string[]): CliArgs | string {
  const args: CliArgs = { words: [], full: false, help: false };
  let flagsDone = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!flagsDone) {
      if (arg === "--") {
        flagsDone = true;
        continue;
      }
      if (arg === "-h" || arg === "--help") {
        args.help = true;
        continue;
      }
      if (arg === "--full") {
        args.full = true;
        continue;
      }
      if (arg === "--seed") {
        const seed = argv[i + 1];
        if (seed === undefined) return "--seed needs a value";
        args.seed = seed;
        i++;
        continue;
      }
    }

    if (args.command === undefined) args.command = arg;
    else args.words.push(arg);
  }

  return args;
}

/**
 * Run one CLI command and resolve with the process exit code:
 * 0 on success, 1 when the expression is rejected, 2 on usage errors.
 */
export async function runCLI(argv: string[], options: CliOptions = {}): Promise<number> {
  let config: Config;
  try {
    config = loadConfig(options.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return 2;
    }
    throw error;
  }

  const logger = options.logger ?? createCliLogger(config.logLevel);
  const args = parseArgs(argv);
  if (typeof args === "string") {
    console.error(args);
    printUsage();
    return 2;
  }

  if (args.help || args.command === undefined || args.command === "help") {
    printUsage();
    return args.command === undefined && !args.help ? 2 : 0;
  }

  if (args.command !== "roll" && args.command !== "info") {
    console.error(`Unknown command: ${args.command}`);
    printUsage();
    return 2;
  }

  const input = args.words.join(" ").trim();
  if (input === "") {
    console.error(`Missing expression for ${args.command}`);
    printUsage();
    return 2;
  }
  if (input.length > config.maxInputLength) {
    console.error(`Expression is longer than ${config.maxInputLength} characters`);
    return 2;
  }

  try {
    const expression = parse(input);
    logger.debug(`parsed "${input}" as ${expression} (${expression.diceCount} dice)`);

    if (args.command === "info") {
      const started = Date.now();
      const engine = new EVEngine({ maxEntries: config.cacheSize });
      const summary = expression.summary(engine);
      logger.debug(`computed summary in ${Date.now() - started}ms`);
      console.log(formatSummary(expression, summary));
      return 0;
    }

    const random = args.seed !== undefined ? seededRandom(args.seed) : options.random ?? defaultRandom;
    const output = args.full
      ? expression.verboseRollFormatted(random).trace
      : formatRoll(expression.verboseRoll(random));
    console.log(output);
    return 0;
  } catch (error) {
    if (isDiceError(error)) {
      logger.debug(`rejected "${input}": ${error.code}`);
      console.error(error.message);
      return 1;
    }
    logger.error(`failed to evaluate "${input}": ${error instanceof Error ? error.stack : String(error)}`);
    return 1;
  }
}

/**
 * CLI logger backed by winston. Diagnostics go to stderr so stdout carries only
 * command output. Library modules do not log.
 */
import { createLogger, format, transports } from "winston";
import { LOG_LEVELS, type LogLevel } from "./config";

const { combine, timestamp, printf } = format;

const logFormat = printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

export function createCliLogger(level: LogLevel = "warn", silent = false) {
  return createLogger({
    level,
    silent,
    format: combine(timestamp(), logFormat),
    transports: [new transports.Console({ stderrLevels: [...LOG_LEVELS] })],
  });
}

export type CliLogger = ReturnType<typeof createCliLogger>;

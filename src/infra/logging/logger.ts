import winston, { type Logger } from "winston";
import type TransportStream from "winston-transport";

export type LogSink = Pick<Logger, "debug" | "info" | "warn" | "error">;

export interface AppLoggerOptions {
  level: string;
  logFile: string | null;
  // stdout belongs to the MCP stdio transport, so console output must go to stderr there.
  consoleToStderr?: boolean;
}

const ALL_LEVELS = Object.keys(winston.config.npm.levels);

const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf(
    ({ timestamp, level, message }) => `${timestamp} - ${level.toUpperCase()} - ${message}`,
  ),
);

export function createAppLogger(options: AppLoggerOptions): Logger {
  const transports: TransportStream[] = [
    new winston.transports.Console({
      stderrLevels: options.consoleToStderr ? ALL_LEVELS : [],
    }),
  ];

  if (options.logFile) {
    transports.push(new winston.transports.File({ filename: options.logFile }));
  }

  return winston.createLogger({
    level: options.level,
    format: lineFormat,
    transports,
  });
}

export function createSilentLogger(): Logger {
  return winston.createLogger({ silent: true });
}

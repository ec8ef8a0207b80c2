import winston from "winston";

type LevelName = "debug" | "info" | "warn" | "error";

function getLogLevel(): LevelName {
  switch (process.env.LOG_LEVEL?.toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    case "info":
    default:
      return "info";
  }
}

// stdout belongs to the MCP stdio transport, so every level goes to stderr
const logger = winston.createLogger({
  level: getLogLevel(),
  format: winston.format.printf((entry) => `[${entry.level.toUpperCase()}] ${String(entry.message)}`),
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
    }),
  ],
});

export function setLogLevel(level: LevelName): void {
  logger.level = level;
}

export function debug(message: string): void {
  logger.debug(message);
}

export function info(message: string): void {
  logger.info(message);
}

export function warn(message: string): void {
  logger.warn(message);
}

export function error(message: string): void {
  logger.error(message);
}

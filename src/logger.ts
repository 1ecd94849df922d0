import winston from "winston";
import type { LogLevel } from "./config.js";

export type Logger = winston.Logger;

const consoleFormat = winston.format.printf((info) => {
  const { level, message, timestamp, stage, service: _service, ...metadata } = info;
  const stageInfo = typeof stage === "string" ? ` [${stage}]` : "";
  const extra = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : "";
  return `${String(timestamp)} ${level}:${stageInfo} ${String(message)}${extra}`;
});

export function createLogger(level: LogLevel): Logger {
  return winston.createLogger({
    level: level === "silent" ? "error" : level,
    silent: level === "silent",
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: "panelverse" },
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(winston.format.colorize(), consoleFormat)
      })
    ]
  });
}

export function stageLogger(logger: Logger, stage: string): Logger {
  return logger.child({ stage });
}

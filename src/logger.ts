// Console logger (winston)
// log / warn / error keep the call sites short: log("📈 OPENED ...")

import winston from "winston";

const level = process.env.LOG_LEVEL || "info";

const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? " " + JSON.stringify(meta) : "";
    return `[${timestamp}] ${level.toUpperCase()} ${message}${metaStr}`;
  })
);

export const logger = winston.createLogger({
  level,
  format: lineFormat,
  transports: [
    new winston.transports.Console({
      silent: process.env.NODE_ENV === "test" || process.env.VITEST !== undefined,
    }),
  ],
});

export function log(message: string, meta?: Record<string, unknown>): void {
  if (meta) logger.info(message, meta);
  else logger.info(message);
}

export function warn(message: string, meta?: Record<string, unknown>): void {
  if (meta) logger.warn(message, meta);
  else logger.warn(message);
}

export function error(message: string, meta?: Record<string, unknown>): void {
  if (meta) logger.error(message, meta);
  else logger.error(message);
}

export function debug(message: string, meta?: Record<string, unknown>): void {
  if (meta) logger.debug(message, meta);
  else logger.debug(message);
}

/**
 * @file src/utils/logger.ts
 * @description Configures and exports the Winston logger: a colourised console transport plus
 *   daily-rotated combined and error log files with "latest.log" symlinks.
 * @remarks
 *   LOG_LEVEL picks the level (default "info"), LOG_TO_FILE=false keeps everything on the console,
 *   and LOG_SILENT=true mutes the logger entirely (the test run sets it).
 */

import fs from "fs";
import type { TransformableInfo } from "logform";
import path from "path";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import { LOGS_DIR, LOGS_ERROR_DIR } from "../config/paths.js";
import { getOptional, getOptionalBoolean, initialiseEnv } from "./env.js";

initialiseEnv();
const { combine, timestamp, printf, colorize, errors, splat } = winston.format;

const level = getOptional("LOG_LEVEL", "info");
const logToFile = getOptionalBoolean("LOG_TO_FILE", true);
const silent = getOptionalBoolean("LOG_SILENT", false);

/**
 * `[time] [LEVEL]: message`, with the stack in place of the message for errors
 * and a bell character in front of error lines.
 */
const logFormat = printf((info: TransformableInfo) => {
  const bell = info.level === "error" ? "\u0007" : "";
  const body =
    typeof info.stack === "string" ? info.stack : String(info.message);
  return `${bell}[${String(info.timestamp)}] [${info.level.toUpperCase()}]: ${body}`;
});

const commonFormat = combine(
  timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  errors({ stack: true }),
  splat(),
  logFormat
);

const transports: Array<
  winston.transports.ConsoleTransportInstance | DailyRotateFile
> = [
  new winston.transports.Console({
    format: combine(colorize({ all: true }), commonFormat),
  }),
];

if (logToFile && !silent) {
  for (const dir of [LOGS_DIR, LOGS_ERROR_DIR]) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  // Errors only, kept for 14 days.
  transports.push(
    new DailyRotateFile({
      level: "error",
      dirname: LOGS_ERROR_DIR,
      filename: "error-%DATE%.log",
      datePattern: "YYYY-MM-DD",
      zippedArchive: true,
      maxFiles: "14d",
      symlinkName: path.join(LOGS_ERROR_DIR, "latest.log"),
    })
  );

  // Everything at the configured level, kept for 30 days.
  transports.push(
    new DailyRotateFile({
      level,
      dirname: LOGS_DIR,
      filename: "combined-%DATE%.log",
      datePattern: "YYYY-MM-DD",
      zippedArchive: true,
      maxFiles: "30d",
      symlinkName: path.join(LOGS_DIR, "latest.log"),
    })
  );
}

const logger = winston.createLogger({
  level,
  silent,
  format: commonFormat,
  transports,
});

export default logger;

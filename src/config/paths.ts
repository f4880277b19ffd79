/**
 * @file src/config/paths.ts
 * @description Default filesystem locations used by the bot.
 *
 *   Resolved against the working directory.
 */
import { join } from "path";

/**
 * Base directory under which persisted bot data lives.
 */
export const DATA_DIR = join(process.cwd(), "data");

/**
 * Default location of the tag document (override with TAGS_FILE).
 */
export const TAGS_FILE = join(DATA_DIR, "tags.json");

/** ─── Logging directories ─────────────────────────────────────────────────── */

/**
 * Root directory for rotated Winston log files.
 */
export const LOGS_DIR = join(process.cwd(), "logs");

/**
 * Error-level logs, rotated separately.
 */
export const LOGS_ERROR_DIR = join(LOGS_DIR, "error");

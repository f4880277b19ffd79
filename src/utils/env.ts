/**
 * @file src/utils/env.ts
 * @description Loads the `.env` file once and exposes typed accessors for environment variables.
 *
 *   `initialiseEnv()` must run before any accessor; the entry point and the logger both call it,
 *   and repeated calls are no-ops.
 */

import dotenv from "dotenv";

let isInitialised = false;

/**
 * Load variables from the env file into `process.env`.
 * @param path - Optional path to the env file (defaults to “.env” in the working directory).
 */
export function initialiseEnv(path?: string): void {
  if (isInitialised) return;
  dotenv.config({ path });
  isInitialised = true;
}

function assertInitialised(name: string): void {
  if (!isInitialised) {
    throw new Error(
      `Environment not initialised. Call initialiseEnv() before reading "${name}".`
    );
  }
}

/**
 * Read a variable that must be set to a non-empty value.
 * @throws If the variable is missing or blank.
 */
export function getRequired(name: string): string {
  assertInitialised(name);
  const value = process.env[name];
  if (!value || value.trim() === "") {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Read an optional variable, falling back to `defaultValue` when unset or blank.
 */
export function getOptional(name: string, defaultValue = ""): string {
  assertInitialised(name);
  const value = process.env[name];
  return value && value.trim() !== "" ? value : defaultValue;
}

/**
 * Read an optional on/off flag. Accepts true/false, 1/0, yes/no and on/off in any case.
 * @throws If the variable is set to something else.
 */
export function getOptionalBoolean(name: string, defaultValue: boolean): boolean {
  const raw = getOptional(name).trim().toLowerCase();
  if (raw === "") return defaultValue;
  if (["true", "1", "yes", "on"].includes(raw)) return true;
  if (["false", "0", "no", "off"].includes(raw)) return false;
  throw new Error(`Environment variable ${name} must be a boolean, got "${raw}"`);
}

/**
 * @file src/store/tagErrors.ts
 * @description Error taxonomy of the tag store and the result type its operations resolve to.
 * @remarks
 *   Business failures (validation, duplicate, not found, permission) and failed saves are returned
 *   as `{ ok: false, error }` rather than thrown. Only {@link TagStoreLoadError} is thrown, because a
 *   tag file that exists but cannot be read must stop the bot from starting.
 */

export type TagErrorKind =
  | "validation"
  | "duplicate"
  | "not-found"
  | "permission"
  | "persistence";

/**
 * Base class of every error a store operation can resolve with.
 */
export abstract class TagError extends Error {
  abstract readonly kind: TagErrorKind;
}

export type TagValidationReason =
  | "missing-name"
  | "blocked-name"
  | "name-too-long"
  | "missing-content"
  | "invalid-owner";

export class TagValidationError extends TagError {
  readonly kind = "validation";

  constructor(
    readonly reason: TagValidationReason,
    message: string
  ) {
    super(message);
    this.name = "TagValidationError";
  }
}

export class DuplicateTagError extends TagError {
  readonly kind = "duplicate";

  constructor(readonly tagName: string) {
    super(`Tag "${tagName}" already exists.`);
    this.name = "DuplicateTagError";
  }
}

export class TagNotFoundError extends TagError {
  readonly kind = "not-found";

  constructor(readonly tagName: string) {
    super(`Tag "${tagName}" not found.`);
    this.name = "TagNotFoundError";
  }
}

export class TagPermissionError extends TagError {
  readonly kind = "permission";

  constructor(
    readonly tagName: string,
    readonly requesterId: string
  ) {
    super("You do not have permission to do that.");
    this.name = "TagPermissionError";
  }
}

/**
 * The tag file could not be rewritten. The previous file is intact; the in-memory change stays
 * applied and becomes durable with the next successful save.
 */
export class TagPersistenceError extends TagError {
  readonly kind = "persistence";

  constructor(
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to save tags to ${filePath}`, options);
    this.name = "TagPersistenceError";
  }
}

/**
 * The tag file exists but could not be read or does not hold a valid tag document.
 */
export class TagStoreLoadError extends Error {
  constructor(
    readonly filePath: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to load tags from ${filePath}: ${detail}`, options);
    this.name = "TagStoreLoadError";
  }
}

export type AnyTagError =
  | TagValidationError
  | DuplicateTagError
  | TagNotFoundError
  | TagPermissionError
  | TagPersistenceError;

export type TagResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: AnyTagError };

export function ok<T>(value: T): TagResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: AnyTagError): TagResult<T> {
  return { ok: false, error };
}

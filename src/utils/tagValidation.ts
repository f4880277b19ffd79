/**
 * @file src/utils/tagValidation.ts
 * @description Tag name and content rules, name normalisation and namespace key helpers.
 */

import type { GuildContext } from "@/types/index.js";
import { TagValidationError } from "../store/tagErrors.js";

/**
 * Namespace key of tags that are visible everywhere.
 */
export const GENERIC_NAMESPACE = "generic";

export const MAX_TAG_NAME_LENGTH = 100;

// Largest Discord snowflake: owner ids are written to the tag file as unsigned 64-bit integers.
export const MAX_OWNER_ID = 18446744073709551615n;

const CANONICAL_OWNER_ID = /^(0|[1-9]\d*)$/;

// Substrings that would turn a tag name into a mass mention.
export const BLOCKED_NAME_SUBSTRINGS = ["@everyone", "@here"] as const;

/**
 * Namespace key a tag created in `guildId` is stored under.
 */
export function namespaceFor(guildId: GuildContext): string {
  return guildId ?? GENERIC_NAMESPACE;
}

/**
 * Inverse of {@link namespaceFor}: the `location` of tags stored under `namespace`.
 */
export function locationOf(namespace: string): string | null {
  return namespace === GENERIC_NAMESPACE ? null : namespace;
}

/**
 * Canonical form of a user-supplied tag name: trimmed and lowercased.
 */
export function normalizeTagName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Check a normalised tag name.
 * @returns The validation error, or undefined when the name is acceptable.
 */
export function verifyTagName(name: string): TagValidationError | undefined {
  if (name.length === 0) {
    return new TagValidationError("missing-name", "Please specify a name for the tag.");
  }
  if (BLOCKED_NAME_SUBSTRINGS.some((blocked) => name.includes(blocked))) {
    return new TagValidationError("blocked-name", "Tag contains blocked words.");
  }
  // Counted in code points so emoji names are not penalised for surrogate pairs.
  if ([...name].length > MAX_TAG_NAME_LENGTH) {
    return new TagValidationError(
      "name-too-long",
      `Tag name limit is ${MAX_TAG_NAME_LENGTH} characters.`
    );
  }
  return undefined;
}

/**
 * Check tag content: anything but an empty or whitespace-only string.
 */
export function verifyTagContent(content: string): TagValidationError | undefined {
  if (content.trim().length === 0) {
    return new TagValidationError(
      "missing-content",
      "Please specify some content for the tag."
    );
  }
  return undefined;
}

/**
 * Check an owner id: decimal digits without leading zeros, no larger than {@link MAX_OWNER_ID}.
 */
export function verifyOwnerId(ownerId: string): TagValidationError | undefined {
  if (!CANONICAL_OWNER_ID.test(ownerId) || BigInt(ownerId) > MAX_OWNER_ID) {
    return new TagValidationError("invalid-owner", "Tag owner is not a valid user id.");
  }
  return undefined;
}

/**
 * @file src/utils/discordHelpers.ts
 * @description Discord-facing helpers for the tag command: owner profile lookup and mention-safe
 *   reply options.
 */

import type { OwnerLookup, OwnerProfile } from "@/types/index.js";
import type { MessageMentionOptions } from "discord.js";
import logger from "./logger.js";

/**
 * Tag content is user-written; replies never ping anyone, whatever the content says.
 */
export const NO_MENTIONS: MessageMentionOptions = { parse: [] };

/**
 * The part of a discord.js user the owner lookup reads.
 */
export interface OwnerUser {
  username: string;
  avatarURL(): string | null;
}

/**
 * Where users come from: satisfied by `client.users`.
 */
export interface OwnerUserSource {
  cache: { get(id: string): OwnerUser | undefined };
  fetch(id: string): Promise<OwnerUser>;
}

function toProfile(user: OwnerUser): OwnerProfile {
  const avatarUrl = user.avatarURL();
  return avatarUrl ? { name: user.username, avatarUrl } : { name: user.username };
}

/**
 * Build an {@link OwnerLookup} that checks the client's user cache first and falls back to a
 * REST fetch. A user that cannot be fetched resolves to undefined so the caller can render
 * without the owner's name and avatar.
 */
export function createOwnerLookup(users: OwnerUserSource): OwnerLookup {
  return async (ownerId) => {
    const cached = users.cache.get(ownerId);
    if (cached) return toProfile(cached);

    try {
      const fetched = await users.fetch(ownerId);
      return toProfile(fetched);
    } catch (err) {
      logger.warn(`[discordHelpers] Could not fetch tag owner ${ownerId}:`, err);
      return undefined;
    }
  };
}

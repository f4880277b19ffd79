/**
 * @file src/types/index.ts
 * @description Shared type definitions for tags, namespaces and the owner profile used when rendering.
 */

import type {
  ChatInputCommandInteraction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";

/**
 * Guild the caller is in, or null outside any guild (direct messages).
 */
export type GuildContext = string | null;

/**
 * A named text snippet.
 */
export interface Tag {
  /** Lowercase name, unique within its namespace. */
  name: string;
  /** Text sent when the tag is invoked. */
  content: string;
  /** Discord user id (snowflake digits) of the creator. */
  ownerId: string;
  /** Number of times the tag has been invoked. */
  uses: number;
  /** Guild the tag belongs to; null for generic tags. */
  location: string | null;
  /** Creation time; never changes afterwards. */
  createdAt: Date;
}

/**
 * Namespace key ("generic" or a guild id) → tag name → tag.
 */
export type NamespaceMap = Map<string, Map<string, Tag>>;

/**
 * Display details of a tag owner, as far as they could be resolved.
 */
export interface OwnerProfile {
  name: string;
  avatarUrl?: string;
}

/**
 * Resolves an owner id to a profile; resolves undefined when the user cannot be found.
 */
export type OwnerLookup = (ownerId: string) => Promise<OwnerProfile | undefined>;

/**
 * A slash command the entry point registers and routes interactions to.
 */
export interface SlashCommandModule {
  /** Registration payload, also the source of the command name. */
  data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  /** Handler for one invocation. */
  execute: (interaction: ChatInputCommandInteraction) => Promise<void>;
}

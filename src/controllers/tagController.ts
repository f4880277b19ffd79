/**
 * @file src/controllers/tagController.ts
 * @description Runs one parsed tag command against the tag store and turns the outcome into a reply.
 *
 * The command set is closed: every {@link TagCommand} variant is handled in one exhaustive switch,
 * and every store error kind maps to its own user-facing message. A failed save is never reported
 * as success.
 */

import type { GuildContext, OwnerLookup, Tag } from "@/types/index.js";
import type { EmbedBuilder } from "discord.js";
import type { AnyTagError, TagResult } from "../store/tagErrors.js";
import type { TagStore } from "../store/tagStore.js";
import logger from "../utils/logger.js";
import { buildTagEmbed } from "../utils/tagEmbed.js";

export type TagCommand =
  | { kind: "create"; name: string; content: string }
  | { kind: "info"; name: string }
  | { kind: "list" }
  | { kind: "edit"; name: string; content: string }
  | { kind: "delete"; name: string }
  | { kind: "use"; name: string };

/**
 * Who ran the command and where.
 */
export interface TagCommandContext {
  guildId: GuildContext;
  userId: string;
}

/**
 * What to send back. Errors are flagged so the command layer can reply privately.
 */
export type TagReply =
  | { type: "text"; content: string; isError: boolean }
  | { type: "embed"; embed: EmbedBuilder };

function assertNever(value: never): never {
  throw new Error(`Unhandled tag command: ${JSON.stringify(value)}`);
}

function text(content: string): TagReply {
  return { type: "text", content, isError: false };
}

/**
 * User-facing message for each store error.
 */
export function describeTagError(error: AnyTagError): string {
  switch (error.kind) {
    case "validation":
    case "duplicate":
    case "not-found":
    case "permission":
      return error.message;
    case "persistence":
      return (
        "⚠️ The change took effect but could not be saved to disk yet; " +
        "it will be written with the next successful save."
      );
    default:
      return assertNever(error);
  }
}

function errorReply(error: AnyTagError): TagReply {
  return { type: "text", content: describeTagError(error), isError: true };
}

function replyWith(
  result: TagResult<Tag>,
  render: (tag: Tag) => TagReply
): TagReply {
  return result.ok ? render(result.value) : errorReply(result.error);
}

/**
 * Execute `command` for the caller described by `ctx`.
 * @param lookupOwner - Resolves the owner's profile for the info embed.
 */
export async function runTagCommand(
  store: TagStore,
  command: TagCommand,
  ctx: TagCommandContext,
  lookupOwner: OwnerLookup
): Promise<TagReply> {
  logger.debug(
    `[tagController] ${command.kind} by userId=${ctx.userId} guildId=${ctx.guildId ?? "none"}`
  );
  const { guildId, userId } = ctx;

  switch (command.kind) {
    case "create":
      return replyWith(
        await store.createTag(guildId, command.name, command.content, userId),
        (tag) => text(`Tag "${tag.name}" successfully created.`)
      );

    case "info": {
      const result = await store.getTag(guildId, command.name);
      if (!result.ok) return errorReply(result.error);
      const owner = await lookupOwner(result.value.ownerId);
      return { type: "embed", embed: buildTagEmbed(result.value, owner) };
    }

    case "list": {
      const names = await store.listTags(guildId);
      return text(
        names.length === 0
          ? "No tags available."
          : `Available tags: ${names.join(", ")}`
      );
    }

    case "edit":
      return replyWith(
        await store.editTag(guildId, command.name, command.content, userId),
        (tag) => text(`Tag "${tag.name}" successfully updated.`)
      );

    case "delete":
      return replyWith(
        await store.deleteTag(guildId, command.name, userId),
        (tag) => text(`Tag "${tag.name}" successfully deleted.`)
      );

    case "use":
      return replyWith(await store.incrementUse(guildId, command.name), (tag) =>
        text(tag.content)
      );

    default:
      return assertNever(command);
  }
}

/**
 * @file src/utils/tagEmbed.ts
 * @description Renders a tag's details as a Discord embed.
 */

import type { OwnerProfile, Tag } from "@/types/index.js";
import { EmbedBuilder } from "discord.js";

/**
 * Title is the tag name; fields show the owner mention and use count; the author line shows the
 * owner's name and avatar when a profile is available; the footer says whether the tag is generic.
 */
export function buildTagEmbed(tag: Tag, owner?: OwnerProfile): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(tag.name)
    .addFields(
      { name: "Owner", value: `<@!${tag.ownerId}>` },
      { name: "Uses", value: tag.uses.toString() }
    )
    .setTimestamp(tag.createdAt)
    .setFooter({ text: tag.location === null ? "Generic" : "Server-specific" });

  if (owner) {
    embed.setAuthor({ name: owner.name, iconURL: owner.avatarUrl });
  }
  return embed;
}

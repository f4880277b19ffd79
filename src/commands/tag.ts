/**
 * @file src/commands/tag.ts
 * @description The /tag slash command: create, inspect, list, edit, delete and invoke named text snippets.
 * @remarks
 *   Tags created in a server belong to that server; tags created in DMs are generic and visible
 *   everywhere. Only a tag's owner may edit or delete it.
 *   Errors are answered ephemerally; replies never ping anyone.
 */
import type { OwnerLookup, SlashCommandModule } from "@/types/index.js";
import {
  ChatInputCommandInteraction,
  type InteractionEditReplyOptions,
  type InteractionReplyOptions,
  MessageFlags,
  SlashCommandBuilder,
  SlashCommandStringOption,
} from "discord.js";
import {
  runTagCommand,
  type TagCommand,
  type TagReply,
} from "../controllers/tagController.js";
import type { TagStore } from "../store/tagStore.js";
import { NO_MENTIONS } from "../utils/discordHelpers.js";
import logger from "../utils/logger.js";
import { normalizeTagName } from "../utils/tagValidation.js";

const nameOption = (opt: SlashCommandStringOption, description: string) =>
  opt.setName("name").setDescription(description).setRequired(true);

const contentOption = (opt: SlashCommandStringOption) =>
  opt.setName("content").setDescription("Text of the tag").setRequired(true);

/**
 * Slash command registration data for /tag.
 */
export const data = new SlashCommandBuilder()
  .setName("tag")
  .setDescription("Store and recall named text snippets")
  .addSubcommand((sub) =>
    sub
      .setName("create")
      .setDescription("Create a tag here (server-specific) or in DMs (generic)")
      .addStringOption((opt) => nameOption(opt, "Name of the new tag"))
      .addStringOption(contentOption)
  )
  .addSubcommand((sub) =>
    sub
      .setName("info")
      .setDescription("Show who owns a tag and how often it was used")
      .addStringOption((opt) => nameOption(opt, "Tag to describe"))
  )
  .addSubcommand((sub) =>
    sub.setName("list").setDescription("List the tags available here")
  )
  .addSubcommand((sub) =>
    sub
      .setName("edit")
      .setDescription("Replace the content of a tag you own")
      .addStringOption((opt) => nameOption(opt, "Tag to edit"))
      .addStringOption(contentOption)
  )
  .addSubcommand((sub) =>
    sub
      .setName("delete")
      .setDescription("Delete a tag you own")
      .addStringOption((opt) => nameOption(opt, "Tag to delete"))
  )
  .addSubcommand((sub) =>
    sub
      .setName("use")
      .setDescription("Post a tag's content")
      .addStringOption((opt) => nameOption(opt, "Tag to post"))
  );

/**
 * The option accessors parsing needs; `interaction.options` satisfies it.
 */
export interface TagCommandOptions {
  getSubcommand(): string;
  getString(name: string, required: true): string;
}

/**
 * Turn the invoked subcommand and its options into a {@link TagCommand}.
 * Tag names are normalised here, before they reach the store.
 * @throws If the subcommand is not one /tag registers.
 */
export function parseTagCommand(options: TagCommandOptions): TagCommand {
  const subcommand = options.getSubcommand();
  const name = () => normalizeTagName(options.getString("name", true));
  const content = () => options.getString("content", true);

  switch (subcommand) {
    case "create":
      return { kind: "create", name: name(), content: content() };
    case "info":
      return { kind: "info", name: name() };
    case "list":
      return { kind: "list" };
    case "edit":
      return { kind: "edit", name: name(), content: content() };
    case "delete":
      return { kind: "delete", name: name() };
    case "use":
      return { kind: "use", name: name() };
    default:
      throw new Error(`Unknown /tag subcommand: ${subcommand}`);
  }
}

/**
 * The parts of a chat input interaction /tag reads and replies through.
 */
export interface TagInteraction {
  readonly options: TagCommandOptions;
  readonly user: { id: string };
  readonly guildId: string | null;
  readonly deferred: boolean;
  deferReply(): Promise<unknown>;
  reply(options: InteractionReplyOptions): Promise<unknown>;
  editReply(options: InteractionEditReplyOptions): Promise<unknown>;
}

async function sendReply(interaction: TagInteraction, reply: TagReply): Promise<void> {
  if (reply.type === "embed") {
    const payload = { embeds: [reply.embed], allowedMentions: NO_MENTIONS };
    if (interaction.deferred) {
      await interaction.editReply(payload);
    } else {
      await interaction.reply(payload);
    }
    return;
  }

  if (interaction.deferred) {
    await interaction.editReply({
      content: reply.content,
      allowedMentions: NO_MENTIONS,
    });
    return;
  }
  await interaction.reply({
    content: reply.content,
    allowedMentions: NO_MENTIONS,
    flags: reply.isError ? MessageFlags.Ephemeral : undefined,
  });
}

/**
 * Parse, run and answer one /tag invocation.
 */
export async function handleTagInteraction(
  store: TagStore,
  lookupOwner: OwnerLookup,
  interaction: TagInteraction
): Promise<void> {
  const command = parseTagCommand(interaction.options);
  logger.debug(`[tag] /tag ${command.kind} invoked by userId=${interaction.user.id}`);

  // Fetching the owner may outlast Discord's three second reply window. Only found tags get
  // that far, so error replies are still sent directly and stay ephemeral.
  const deferThenLookup: OwnerLookup = async (ownerId) => {
    await interaction.deferReply();
    return lookupOwner(ownerId);
  };

  const reply = await runTagCommand(
    store,
    command,
    { guildId: interaction.guildId, userId: interaction.user.id },
    deferThenLookup
  );
  await sendReply(interaction, reply);
}

/**
 * Bind /tag to a store and an owner lookup.
 */
export function createTagCommand(
  store: TagStore,
  lookupOwner: OwnerLookup
): SlashCommandModule {
  return {
    data,
    execute: (interaction: ChatInputCommandInteraction) =>
      handleTagInteraction(store, lookupOwner, interaction),
  };
}

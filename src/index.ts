/**
 * @file src/index.ts
 * @description Entry point: loads configuration, opens the tag store, logs in to Discord,
 *   registers the /tag command and routes interactions to it.
 * @remarks
 *   A tag file that exists but cannot be loaded aborts startup; the bot never starts with an empty
 *   store in place of unreadable data.
 */

import { REST } from "@discordjs/rest";
import { Routes } from "discord-api-types/v10";
import {
  ChatInputCommandInteraction,
  Client,
  Collection,
  GatewayIntentBits,
  Interaction,
  MessageFlags,
} from "discord.js";
import type { SlashCommandModule } from "@/types/index.js";
import { createTagCommand } from "./commands/tag.js";
import { loadBotConfig } from "./config/index.js";
import { TagStore } from "./store/tagStore.js";
import { createOwnerLookup } from "./utils/discordHelpers.js";
import { initialiseEnv } from "./utils/env.js";
import logger from "./utils/logger.js";

(async () => {
  // 1️⃣ Environment and configuration
  initialiseEnv();
  const config = loadBotConfig();

  // 2️⃣ Tag store
  const store = await TagStore.open(config.tagsFile).catch((err: unknown) => {
    logger.error("❌ Could not load tags; refusing to start:", err);
    return process.exit(1);
  });

  // 3️⃣ Discord client and commands
  const client = new Client({ intents: [GatewayIntentBits.Guilds] });
  const commands = new Collection<string, SlashCommandModule>();
  const tagCommand = createTagCommand(store, createOwnerLookup(client.users));
  commands.set(tagCommand.data.name, tagCommand);

  async function registerGlobalCommands(): Promise<void> {
    const rest = new REST({ version: "10" }).setToken(config.token);
    const payload = Array.from(commands.values()).map((c) => c.data.toJSON());
    logger.info("🌐 Registering global slash commands...");
    await rest.put(Routes.applicationCommands(config.clientId), {
      body: payload,
    });
    logger.info(`✅ Registered ${payload.length} slash command(s).`);
  }

  // 4️⃣ Event listeners
  client.once("ready", async (ready) => {
    logger.info(`🤖 Logged in as ${ready.user.tag}`);
    try {
      await registerGlobalCommands();
    } catch (err) {
      logger.error("❌ Failed to register slash commands:", err);
    }
  });

  client.on("interactionCreate", async (interaction: Interaction) => {
    if (!interaction.isChatInputCommand()) return;
    const command = commands.get(interaction.commandName);
    if (!command) return;

    try {
      await command.execute(interaction);
    } catch (err) {
      logger.error(`🛑 Error executing /${interaction.commandName}:`, err);
      await replyWithFailure(interaction);
    }
  });

  async function replyWithFailure(
    interaction: ChatInputCommandInteraction
  ): Promise<void> {
    const replyOptions = {
      content: "⚠️ There was an error while running this command.",
      flags: MessageFlags.Ephemeral,
    } as const;
    try {
      if (interaction.deferred || interaction.replied) {
        await interaction.followUp(replyOptions);
      } else {
        await interaction.reply(replyOptions);
      }
    } catch (err) {
      logger.error("🛑 Could not report the failure to the user:", err);
    }
  }

  // 5️⃣ Unhandled rejections and graceful shutdown
  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled promise rejection:", reason);
  });
  process.on("SIGINT", () => {
    logger.info("🛑 Shutting down...");
    store
      .flush()
      .then(() => client.destroy())
      .catch((err) => logger.error("Error during shutdown:", err))
      .finally(() => process.exit(0));
  });

  // 6️⃣ Start
  await client.login(config.token);
  logger.info("🚀 Login successful.");
})().catch((err) => {
  logger.error("❌ Startup failed:", err);
  process.exit(1);
});

/**
 * @file src/config/index.ts
 * @description Assembles the bot's runtime configuration from the environment.
 */
import { resolve } from "path";
import { getOptional, getRequired } from "../utils/env.js";
import logger from "../utils/logger.js";
import { TAGS_FILE } from "./paths.js";

export interface BotConfig {
  // Discord bot token used to log in and register commands.
  token: string;
  // Application (client) id the slash commands are registered under.
  clientId: string;
  // Absolute path of the tag document.
  tagsFile: string;
}

/**
 * Read the configuration; `initialiseEnv()` must have run first.
 * @throws If BOT_TOKEN or CLIENT_ID is missing.
 */
export function loadBotConfig(): BotConfig {
  const config: BotConfig = {
    token: getRequired("BOT_TOKEN"),
    clientId: getRequired("CLIENT_ID"),
    tagsFile: resolve(getOptional("TAGS_FILE", TAGS_FILE)),
  };
  logger.debug(
    `[config] clientId=${config.clientId}, tagsFile=${config.tagsFile}`
  );
  return config;
}

/**
 * Titlekeeper — src/commands/sync.ts
 * WHAT: Guild-scoped slash-command sync on startup.
 * FLOWS:
 *  - syncCommandsToGuild: buildCommands → REST PUT to guild endpoint → log success/error
 *  - syncCommandsToAllGuilds: sequential, spaced to stay under the route rate limit
 * DOCS:
 *  - Bulk overwrite (guild): https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 *  - REST client: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { buildCommands } from "./buildCommands.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { DISCORD_COMMAND_SYNC_DELAY_MS } from "../lib/constants.js";

/**
 * PUT (bulk overwrite) handles additions, updates and removals in one call.
 * Returns whether the guild accepted the payload; failures are logged.
 */
export async function syncCommandsToGuild(guildId: string, rest?: REST): Promise<boolean> {
  const body = buildCommands();
  try {
    const client = rest ?? new REST({ version: "10" }).setToken(env.DISCORD_TOKEN);
    await client.put(Routes.applicationGuildCommands(env.CLIENT_ID, guildId), { body });
    logger.info({ guildId, count: body.length }, "[cmdsync] synced commands to guild");
    return true;
  } catch (err) {
    logger.warn({ guildId, err }, "[cmdsync] failed to sync guild");
    return false;
  }
}

export async function syncCommandsToAllGuilds(guildIds: string[]): Promise<void> {
  const rest = new REST({ version: "10" }).setToken(env.DISCORD_TOKEN);
  for (const guildId of guildIds) {
    await syncCommandsToGuild(guildId, rest);
    // > 500ms (2/sec limit) leaves headroom for jitter
    await new Promise((resolve) => setTimeout(resolve, DISCORD_COMMAND_SYNC_DELAY_MS));
  }
}

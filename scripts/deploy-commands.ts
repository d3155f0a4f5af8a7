/**
 * Titlekeeper — scripts/deploy-commands.ts
 * WHAT: CLI helper to bulk overwrite guild commands and verify every title command landed.
 * FLOWS: build commands → GUILD_ID or every joined guild → REST PUT per guild → verify names
 * DOCS:
 *  - REST client / Routes: https://discord.js.org/#/docs/rest/main/class/REST
 *  - Bulk overwrite guild commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
// GOTCHA: env.ts loads .env as a side effect; it must be imported before anything reads process.env.
import { env } from "../src/lib/env.js";
import { REST, Routes, Client, GatewayIntentBits } from "discord.js";
import { z } from "zod";
import { buildCommands } from "../src/commands/buildCommands.js";
import { DISCORD_COMMAND_SYNC_DELAY_MS } from "../src/lib/constants.js";

const registeredCommandsSchema = z.array(z.object({ name: z.string() }).passthrough());

type SyncResult = {
  guildId: string;
  ok: boolean;
  missing?: string[];
  error?: string;
};

function wait(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function missingCommands(rest: REST, guildId: string, expected: string[]): Promise<string[]> {
  const existing = registeredCommandsSchema.parse(
    await rest.get(Routes.applicationGuildCommands(env.CLIENT_ID, guildId))
  );
  const names = new Set(existing.map((cmd) => cmd.name));
  return expected.filter((name) => !names.has(name));
}

async function syncGuild(rest: REST, guildId: string): Promise<SyncResult> {
  const commands = buildCommands();
  const expected = commands.map((cmd) => cmd.name);
  try {
    await rest.put(Routes.applicationGuildCommands(env.CLIENT_ID, guildId), { body: commands });

    const missing = await missingCommands(rest, guildId, expected);
    if (missing.length === 0) {
      return { guildId, ok: true };
    }

    // Discord's command cache occasionally keeps a stale set; wipe and re-deploy once
    await rest.put(Routes.applicationGuildCommands(env.CLIENT_ID, guildId), { body: [] });
    await wait(500);
    await rest.put(Routes.applicationGuildCommands(env.CLIENT_ID, guildId), { body: commands });

    const stillMissing = await missingCommands(rest, guildId, expected);
    return { guildId, ok: stillMissing.length === 0, missing: stillMissing };
  } catch (err) {
    return { guildId, ok: false, error: describeError(err) };
  }
}

async function listGuildIds(): Promise<string[]> {
  if (env.GUILD_ID) {
    return [env.GUILD_ID];
  }
  // A gateway login is the simplest way to enumerate joined guilds
  const client = new Client({ intents: [GatewayIntentBits.Guilds] });
  await client.login(env.DISCORD_TOKEN);
  try {
    const guilds = await client.guilds.fetch();
    return [...guilds.keys()];
  } finally {
    await client.destroy();
  }
}

async function main(): Promise<void> {
  const rest = new REST({ version: "10" }).setToken(env.DISCORD_TOKEN);
  const guildIds = await listGuildIds();
  console.log(`[sync] deploying ${buildCommands().length} commands to ${guildIds.length} guild(s)`);

  const results: SyncResult[] = [];
  for (const guildId of guildIds) {
    const result = await syncGuild(rest, guildId);
    results.push(result);
    if (result.ok) {
      console.log(`[sync] ${guildId}: ok`);
    } else {
      const detail = result.error ?? `missing ${result.missing?.join(", ")}`;
      console.error(`[sync] ${guildId}: FAILED (${detail})`);
    }
    await wait(DISCORD_COMMAND_SYNC_DELAY_MS);
  }

  const failed = results.filter((r) => !r.ok).length;
  if (failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(`[sync] fatal: ${describeError(err)}`);
  process.exit(1);
});

/**
 * Titlekeeper — src/index.ts
 * WHAT: Main process entrypoint. Opens the title store, boots the Discord client,
 *       routes slash commands and starts the lifecycle scheduler and web surface.
 * FLOWS:
 *  - Boot: Sentry → catalog → store initialize → web server → login
 *  - Ready: notifier transports → per‑guild command sync → lifecycle scheduler
 *  - Interaction: slash command → wrapped handler → ephemeral error reply on failure
 *  - Shutdown: scheduler → web server → client → DB → Sentry flush
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Slash commands (Discord dev docs): https://discord.com/developers/docs/interactions/application-commands
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, addBreadcrumb, setTag, captureException, flushSentry } from "./lib/sentry.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
initializeSentry();

import type http from "node:http";
import { Client, Collection, Events, GatewayIntentBits, MessageFlags, type ChatInputCommandInteraction } from "discord.js";
import { logger } from "./lib/logger.js";

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
  // Don't exit - Discord.js can recover from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

import { env } from "./lib/env.js";
import { wrapCommand } from "./lib/cmdWrap.js";
import { now } from "./lib/time.js";
import { closeDatabase } from "./db/db.js";
import { loadCatalog } from "./config/catalog.js";
import { initialize } from "./store/titleStore.js";
import {
  combineNotifiers,
  createChannelNotifier,
  createWebhookNotifier,
  getActiveNotifier,
  setActiveNotifier,
  type Notifier,
  type NotifierOptions,
} from "./features/notifier.js";
import { startTitleLifecycleScheduler, stopTitleLifecycleScheduler } from "./scheduler/titleLifecycleScheduler.js";
import { startDashboardServer } from "./web/dashboardServer.js";
import { syncCommandsToAllGuilds, syncCommandsToGuild } from "./commands/sync.js";
import * as titles from "./commands/titles.js";
import * as schedule from "./commands/schedule.js";
import * as unschedule from "./commands/unschedule.js";
import * as assign from "./commands/assign.js";
import * as release from "./commands/release.js";

// Slash commands only need the guild itself; no member or message intents
export const client = new Client({ intents: [GatewayIntentBits.Guilds] });

const commands = new Collection<string, (interaction: ChatInputCommandInteraction) => Promise<void>>();
commands.set(titles.data.name, wrapCommand("titles", titles.execute));
commands.set(schedule.data.name, wrapCommand("schedule", schedule.execute));
commands.set(unschedule.data.name, wrapCommand("unschedule", unschedule.execute));
commands.set(assign.data.name, wrapCommand("assign", assign.execute));
commands.set(release.data.name, wrapCommand("release", release.execute));

let webServer: http.Server | null = null;

function buildNotifier(discord: Client): Notifier {
  const opts: NotifierOptions = {
    roleId: env.GUARDIAN_ROLE_ID,
    channelId: env.TITLE_REQUESTS_CHANNEL_ID,
    timeoutMs: env.NOTIFY_TIMEOUT_MS,
  };
  const transports: Notifier[] = [];
  if (env.WEBHOOK_URL) transports.push(createWebhookNotifier(env.WEBHOOK_URL, opts));
  if (env.ANNOUNCE_CHANNEL_ID) transports.push(createChannelNotifier(discord, env.ANNOUNCE_CHANNEL_ID, opts));
  return combineNotifiers(transports);
}

// ===== Boot: store before gateway =====
// A broken catalog or unopenable database is fatal; nothing else can run without them.
try {
  const catalog = loadCatalog(env.TITLES_CATALOG_PATH);
  initialize(catalog);
} catch (err) {
  logger.fatal({ err }, "[startup] title store initialization failed");
  captureException(err, { context: "startup" });
  await flushSentry();
  process.exit(1);
}

if (env.WEB_PORT > 0) {
  webServer = startDashboardServer(env.WEB_PORT, {
    now,
    shiftHours: env.SHIFT_HOURS,
    auditPath: env.AUDIT_CSV_PATH,
    notifyTimeoutMs: env.NOTIFY_TIMEOUT_MS,
    getNotifier: getActiveNotifier,
  });
}

client.once(Events.ClientReady, async (ready) => {
  logger.info({ tag: ready.user.tag, id: ready.user.id }, "Bot ready");
  setTag("bot_id", ready.user.id);
  addBreadcrumb({ message: "Bot successfully connected to Discord", category: "bot", level: "info" });

  setActiveNotifier(buildNotifier(ready));

  const guildIds = env.GUILD_ID ? [env.GUILD_ID] : [...ready.guilds.cache.keys()];
  await syncCommandsToAllGuilds(guildIds);

  startTitleLifecycleScheduler({
    notifier: getActiveNotifier(),
    intervalSeconds: env.TICK_INTERVAL_SECONDS,
    shiftHours: env.SHIFT_HOURS,
    reminderLeadMinutes: env.REMINDER_LEAD_MINUTES,
    notifyTimeoutMs: env.NOTIFY_TIMEOUT_MS,
  });
});

client.on(Events.GuildCreate, (guild) => {
  if (env.GUILD_ID && guild.id !== env.GUILD_ID) return;
  logger.info({ guildId: guild.id }, "[cmdsync] joined guild; syncing commands");
  void syncCommandsToGuild(guild.id);
});

client.on(Events.InteractionCreate, async (interaction) => {
  if (!interaction.isChatInputCommand()) return;

  const executor = commands.get(interaction.commandName);
  if (!executor) {
    addBreadcrumb({
      message: `Unknown command attempted: ${interaction.commandName}`,
      category: "command",
      level: "warning",
    });
    try {
      await interaction.reply({ content: "Unknown command.", flags: MessageFlags.Ephemeral });
    } catch (err) {
      logger.warn({ err, cmd: interaction.commandName }, "[cmd] failed to reply to unknown command");
    }
    return;
  }

  // wrapCommand never rejects
  await executor(interaction);
});

client.on(Events.Error, (err) => {
  logger.error({ err }, "[discord] client error");
});

// ===== Coordinated Graceful Shutdown =====
// ORDER: 1) Stop scheduler, 2) Close web server, 3) Destroy client, 4) Close DB, 5) Flush Sentry
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  try {
    stopTitleLifecycleScheduler();

    if (webServer) {
      const server = webServer;
      await new Promise<void>((resolve) => server.close(() => resolve()));
      logger.debug("[shutdown] Web server closed");
    }

    client.removeAllListeners();
    await client.destroy();
    logger.debug("[shutdown] Discord client destroyed");

    closeDatabase();
    await flushSentry();

    logger.info("[shutdown] Graceful shutdown complete");
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "[shutdown] Error during graceful shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

await client.login(env.DISCORD_TOKEN);

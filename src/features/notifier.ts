/**
 * Titlekeeper — src/features/notifier.ts
 * WHAT: Outbound title notifications (expired, reminder, handoff, request) over a
 *       Discord webhook and/or a bot channel, plus the bounded, non-throwing dispatch
 *       the lifecycle tick uses.
 * FLOWS:
 *  - buildNotificationEmbed(n) → EmbedBuilder shared by every transport
 *  - createWebhookNotifier(url) → POST JSON with AbortSignal.timeout
 *  - createChannelNotifier(client, channelId) → channel.send
 *  - combineNotifiers([...]) → fan out; fails only if every transport failed
 *  - notifySafely(notifier, n, timeoutMs) → boolean, never throws
 * DOCS:
 *  - Execute webhook: https://discord.com/developers/docs/resources/webhook#execute-webhook
 *  - Message timestamp markdown: https://discord.com/developers/docs/reference#message-formatting
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, type Client } from "discord.js";
import { TITLE_EMBED_COLOR, notificationMentions } from "../lib/constants.js";
import { NotifierError } from "../lib/errors.js";
import { logger, redact } from "../lib/logger.js";
import { formatUtc } from "../lib/time.js";

// ===== Types =====

export interface ReminderBooking {
  titleName: string;
  reserverIgn: string;
}

export type Notification =
  | { kind: "expired"; titleName: string; holderIgn: string }
  | {
      kind: "reminder";
      slotKey: string;
      shiftStart: Date;
      shiftHours: number;
      bookings: ReminderBooking[];
    }
  | { kind: "handoff"; titleName: string; reserverIgn: string; slotKey: string; expiresAt: Date }
  | {
      kind: "request";
      titleName: string;
      ign: string;
      coords: string;
      slotKey: string;
      submittedBy: string;
    };

export type NotificationKind = Notification["kind"];

export interface Notifier {
  /** Transport label for logs */
  readonly name: string;
  /** Rejects with NotifierError on failure */
  notify(notification: Notification): Promise<void>;
}

export interface NotifierOptions {
  /** Role pinged on every notification (the guardians) */
  roleId?: string;
  /** Channel linked in the message so guardians know where requests land */
  channelId?: string;
  timeoutMs: number;
}

// ===== Formatting =====

function discordTimestamp(instant: Date, style: "R" | "f"): string {
  return `<t:${Math.floor(instant.getTime() / 1000)}:${style}>`;
}

export function buildNotificationEmbed(n: Notification): EmbedBuilder {
  const embed = new EmbedBuilder().setColor(TITLE_EMBED_COLOR);

  switch (n.kind) {
    case "expired":
      return embed
        .setTitle(`${n.titleName} is available`)
        .setDescription(`**${n.titleName}** held by **${n.holderIgn}** has expired.`);

    case "reminder": {
      const lines = n.bookings.map((b) => `• **${b.titleName}**: **${b.reserverIgn}**`);
      return embed
        .setTitle(`Reminder: shift starts ${formatUtc(n.shiftStart)}`)
        .setDescription(
          `The ${n.shiftHours}-hour shift starts ${discordTimestamp(n.shiftStart, "R")}.\n${lines.join("\n")}`
        );
    }

    case "handoff":
      return embed
        .setTitle(`Scheduled handoff: ${n.titleName}`)
        .setDescription(
          `**${n.reserverIgn}** now holds **${n.titleName}** until ${formatUtc(n.expiresAt)}.`
        );

    case "request":
      return embed
        .setTitle("New Title Request")
        .addFields(
          { name: "Title", value: n.titleName, inline: true },
          { name: "In-Game Name", value: n.ign, inline: true },
          { name: "Coordinates", value: n.coords || "-", inline: true },
          { name: "Slot (UTC)", value: n.slotKey, inline: true },
          { name: "Submitted By", value: n.submittedBy, inline: true }
        )
        .setTimestamp();
  }
}

function mentionLine(opts: NotifierOptions): string {
  const parts: string[] = [];
  if (opts.roleId) parts.push(`<@&${opts.roleId}>`);
  if (opts.channelId) parts.push(`<#${opts.channelId}>`);
  return parts.join(" ");
}

// ===== Transports =====

/**
 * Discord webhook transport. Non-2xx and aborted requests reject with NotifierError.
 */
export function createWebhookNotifier(url: string, opts: NotifierOptions): Notifier {
  return {
    name: "webhook",
    async notify(n) {
      const mentions = notificationMentions(opts.roleId);
      const body = {
        content: mentionLine(opts) || undefined,
        embeds: [buildNotificationEmbed(n).toJSON()],
        allowed_mentions: { parse: mentions.parse, roles: mentions.roles },
      };

      let response: Response;
      try {
        response = await fetch(url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(body),
          signal: AbortSignal.timeout(opts.timeoutMs),
        });
      } catch (err) {
        throw new NotifierError("webhook", `webhook request failed: ${err instanceof Error ? err.message : String(err)}`, err);
      }

      if (!response.ok) {
        throw new NotifierError("webhook", `webhook responded ${response.status}`);
      }
    },
  };
}

/**
 * Posts through the logged-in bot into a text channel.
 */
export function createChannelNotifier(client: Client, channelId: string, opts: NotifierOptions): Notifier {
  return {
    name: "channel",
    async notify(n) {
      try {
        const channel = await client.channels.fetch(channelId);
        if (!channel || !channel.isSendable()) {
          throw new NotifierError("channel", `channel ${channelId} is not a sendable text channel`);
        }
        const content = mentionLine(opts);
        await channel.send({
          content: content || undefined,
          embeds: [buildNotificationEmbed(n)],
          allowedMentions: notificationMentions(opts.roleId),
        });
      } catch (err) {
        if (err instanceof NotifierError) throw err;
        throw new NotifierError("channel", `channel send failed: ${err instanceof Error ? err.message : String(err)}`, err);
      }
    },
  };
}

/**
 * Log-only transport for deployments without a webhook or channel.
 */
export function createNullNotifier(): Notifier {
  return {
    name: "log",
    async notify(n) {
      logger.info({ kind: n.kind }, "[notify] no transport configured; notification logged only");
    },
  };
}

/**
 * Fans out to every transport. Rejects only when all of them failed.
 */
export function combineNotifiers(notifiers: Notifier[]): Notifier {
  if (notifiers.length === 0) return createNullNotifier();
  if (notifiers.length === 1 && notifiers[0]) return notifiers[0];

  const name = notifiers.map((t) => t.name).join("+");
  return {
    name,
    async notify(n) {
      const results = await Promise.allSettled(notifiers.map((t) => t.notify(n)));
      const failures: string[] = [];
      results.forEach((result, i) => {
        if (result.status === "rejected") {
          const transport = notifiers[i]?.name ?? "unknown";
          const reason: unknown = result.reason;
          failures.push(`${transport}: ${reason instanceof Error ? reason.message : String(reason)}`);
        }
      });
      if (failures.length === notifiers.length) {
        throw new NotifierError(name, `all transports failed (${failures.join("; ")})`);
      }
      if (failures.length > 0) {
        logger.warn({ kind: n.kind, failures }, "[notify] some transports failed");
      }
    },
  };
}

/**
 * Bounded dispatch: a failure or timeout is logged and reported as `false`,
 * never thrown. A notification still in flight after the timeout is abandoned.
 */
export async function notifySafely(
  notifier: Notifier,
  notification: Notification,
  timeoutMs: number
): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new NotifierError(notifier.name, `timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    await Promise.race([notifier.notify(notification), timeout]);
    return true;
  } catch (err) {
    logger.warn(
      { err, kind: notification.kind, transport: notifier.name, detail: describe(notification) },
      "[notify] dispatch failed"
    );
    return false;
  } finally {
    clearTimeout(timer);
  }
}

function describe(n: Notification): string {
  switch (n.kind) {
    case "reminder":
      return n.slotKey;
    case "request":
      return redact(`${n.titleName} ${n.ign}`);
    default:
      return n.titleName;
  }
}

// ===== Process-wide transport =====

// Set once on ready; request-driven surfaces read it at call time
let activeNotifier: Notifier = createNullNotifier();

export function setActiveNotifier(notifier: Notifier): void {
  activeNotifier = notifier;
  logger.info({ transport: notifier.name }, "[notify] transport configured");
}

export function getActiveNotifier(): Notifier {
  return activeNotifier;
}

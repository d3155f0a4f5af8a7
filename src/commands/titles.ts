/**
 * Titlekeeper — src/commands/titles.ts
 * WHAT: /titles: current holder of every title plus the upcoming bookings.
 * FLOWS: getAllStatuses + listUpcoming → one embed → public reply
 * DOCS:
 *  - EmbedBuilder: https://discord.js.org/#/docs/builders/main/class/EmbedBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { SCHEDULE_HORIZON_DAYS, TITLE_EMBED_COLOR } from "../lib/constants.js";
import { env } from "../lib/env.js";
import { formatRemaining, formatUtc, now } from "../lib/time.js";
import { listUpcoming, type UpcomingReservation } from "../features/reservations.js";
import { getAllStatuses, type TitleStatus } from "../store/titleStore.js";

export const data = new SlashCommandBuilder()
  .setName("titles")
  .setDescription("Show who holds each title and the upcoming bookings.");

// Embed field values cap at 1024 chars; 15 short lines stay well under it
const MAX_UPCOMING_LINES = 15;

export function buildTitlesEmbed(
  statuses: TitleStatus[],
  upcoming: UpcomingReservation[],
  at: Date
): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle("Title Status").setColor(TITLE_EMBED_COLOR).setTimestamp(at);

  for (const status of statuses) {
    const value = status.holder
      ? `**${status.holder.ign}** (${status.holder.coords})\nTime left: ${formatRemaining(
          status.holder.expiresAt.getTime() - at.getTime()
        )}`
      : "Vacant";
    embed.addFields({ name: status.name, value, inline: true });
  }

  const lines = upcoming
    .slice(0, MAX_UPCOMING_LINES)
    .map((r) => `\`${formatUtc(r.shiftStart)}\` **${r.titleName}**: ${r.reserverIgn}`);
  if (upcoming.length > MAX_UPCOMING_LINES) {
    lines.push(`…and ${upcoming.length - MAX_UPCOMING_LINES} more`);
  }
  embed.addFields({
    name: `Upcoming (next ${SCHEDULE_HORIZON_DAYS} days)`,
    value: lines.length > 0 ? lines.join("\n") : "No bookings.",
  });

  return embed;
}

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction } = ctx;
  // Status board is public
  await ensureDeferred(interaction, false);

  const at = now();
  const { statuses, upcoming } = await withStep(ctx, "load", () => {
    ctx.setLastOp("getAllStatuses");
    const statuses = getAllStatuses();
    ctx.setLastOp("listUpcoming");
    const upcoming = listUpcoming(at, SCHEDULE_HORIZON_DAYS, env.SHIFT_HOURS);
    ctx.setLastOp(null);
    return { statuses, upcoming };
  });

  await withStep(ctx, "reply", () =>
    replyOrEdit(interaction, { embeds: [buildTitlesEmbed(statuses, upcoming, at)] })
  );
}

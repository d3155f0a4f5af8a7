/**
 * Titlekeeper — src/commands/unschedule.ts
 * WHAT: /unschedule: cancel a booking. Reservers may cancel their own (matched by
 *       server display name); administrators and owners may cancel any.
 * FLOWS: resolve title → slotKeyFromParts → cancel() → reply
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { slotKeyFromParts } from "../lib/time.js";
import { cancel, type CancelResult } from "../features/reservations.js";
import { isPrivileged, requesterIdentity } from "../utils/permissions.js";
import { dateOption, resolveTitle, timeOption, titleOption, unknownTitleMessage } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("unschedule")
  .setDescription("Cancel a title booking.")
  .addStringOption(titleOption)
  .addStringOption(dateOption)
  .addStringOption(timeOption);

export function describeCancelResult(result: CancelResult, titleName: string, slotKey: string): string {
  const when = `${slotKey.slice(0, 10)} ${slotKey.slice(11, 16)} UTC`;
  switch (result.kind) {
    case "cancelled":
      return `Cancelled **${titleName}** at ${when} (was booked by **${result.reserverIgn}**).`;
    case "not_found":
      return `No booking for **${titleName}** at ${when}.`;
    case "not_owner":
      return `That slot is booked by **${result.reserverIgn}**; only they or an administrator can cancel it.`;
    case "unknown_title":
      return `Unknown title "${titleName}".`;
  }
}

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction } = ctx;
  const titleInput = interaction.options.getString("title", true);

  const entry = resolveTitle(titleInput);
  if (!entry) {
    await replyOrEdit(interaction, { content: unknownTitleMessage(titleInput) });
    return;
  }

  const slot = await withStep(ctx, "parse_slot", () =>
    slotKeyFromParts(interaction.options.getString("date", true), interaction.options.getString("time", true))
  );

  const privileged = isPrivileged(interaction);
  const identity = requesterIdentity(interaction);

  const result = await withStep(ctx, "cancel", () => {
    ctx.setLastOp("cancelReservation");
    return cancel(entry.name, slot, identity, privileged);
  });

  if (result.kind === "not_owner") {
    logger.info({ titleName: entry.name, slot, userId: interaction.user.id }, "[cmd] unschedule refused: not owner");
  }

  await withStep(ctx, "reply", () =>
    replyOrEdit(interaction, { content: describeCancelResult(result, entry.name, slot) })
  );
}

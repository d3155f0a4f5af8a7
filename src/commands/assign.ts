/**
 * Titlekeeper — src/commands/assign.ts
 * WHAT: /assign: privileged manual grant of a vacant title.
 * FLOWS: permission check → withTickLock(getStatus → assign) → reply
 *
 * NOTE: Runs inside the tick lock so it never interleaves with a reconciliation tick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { MAX_COORDS_LENGTH, MAX_IGN_LENGTH } from "../lib/constants.js";
import { env } from "../lib/env.js";
import { logger, redact } from "../lib/logger.js";
import { withTickLock } from "../lib/tickLock.js";
import { formatUtc, now, shiftEnd } from "../lib/time.js";
import { assign, getStatus } from "../store/titleStore.js";
import { isPrivileged } from "../utils/permissions.js";
import { resolveTitle, titleOption, unknownTitleMessage } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("assign")
  .setDescription("Give a vacant title to a player (administrators only).")
  .addStringOption(titleOption)
  .addStringOption((o) =>
    o.setName("ign").setDescription("In-game name").setRequired(true).setMaxLength(MAX_IGN_LENGTH)
  )
  .addStringOption((o) =>
    o.setName("coords").setDescription("In-game coordinates").setRequired(false).setMaxLength(MAX_COORDS_LENGTH)
  )
  .addNumberOption((o) =>
    o.setName("hours").setDescription("How long to hold it (default: one shift)").setRequired(false).setMinValue(0.25).setMaxValue(24)
  );

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction } = ctx;

  if (!isPrivileged(interaction)) {
    await replyOrEdit(interaction, { content: "You don't have permission to use this command." });
    return;
  }

  const titleInput = interaction.options.getString("title", true);
  const entry = resolveTitle(titleInput);
  if (!entry) {
    await replyOrEdit(interaction, { content: unknownTitleMessage(titleInput) });
    return;
  }

  const ign = interaction.options.getString("ign", true).trim();
  if (ign.length === 0) {
    await replyOrEdit(interaction, { content: "In-game name must not be empty." });
    return;
  }
  const coords = interaction.options.getString("coords")?.trim() || "-";
  const hours = interaction.options.getNumber("hours") ?? env.SHIFT_HOURS;

  const content = await withStep(ctx, "assign", () =>
    withTickLock("assign", async () => {
      ctx.setLastOp("getStatus");
      const status = getStatus(entry.name);
      if (status?.holder) {
        return `**${entry.name}** is already held by **${status.holder.ign}**.`;
      }
      const claimedAt = now();
      const expiresAt = shiftEnd(claimedAt, hours);
      ctx.setLastOp("assign");
      assign(entry.name, ign, coords, interaction.user.id, claimedAt, expiresAt);
      logger.info({ titleName: entry.name, ign: redact(ign), by: interaction.user.id }, "[cmd] title assigned");
      return `✅ **${entry.name}** assigned to **${ign}** until ${formatUtc(expiresAt)}.`;
    })
  );

  await withStep(ctx, "reply", () => replyOrEdit(interaction, { content }));
}

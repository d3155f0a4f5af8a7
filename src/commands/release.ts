/**
 * Titlekeeper — src/commands/release.ts
 * WHAT: /release: privileged manual release of a held title.
 * FLOWS: permission check → withTickLock(getStatus → release) → reply
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { withTickLock } from "../lib/tickLock.js";
import { getStatus, release } from "../store/titleStore.js";
import { isPrivileged } from "../utils/permissions.js";
import { resolveTitle, titleOption, unknownTitleMessage } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("release")
  .setDescription("Free a held title (administrators only).")
  .addStringOption(titleOption);

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

  const content = await withStep(ctx, "release", () =>
    withTickLock("release", async () => {
      ctx.setLastOp("getStatus");
      const status = getStatus(entry.name);
      if (!status?.holder) {
        return `**${entry.name}** is not currently held.`;
      }
      ctx.setLastOp("release");
      release(entry.name);
      logger.info({ titleName: entry.name, by: interaction.user.id }, "[cmd] title released");
      return `✅ **${entry.name}** released from **${status.holder.ign}**.`;
    })
  );

  await withStep(ctx, "reply", () => replyOrEdit(interaction, { content }));
}

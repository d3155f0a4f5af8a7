/**
 * Titlekeeper — src/commands/schedule.ts
 * WHAT: /schedule: book a title shift for an in-game name.
 * FLOWS: resolve title → slotKeyFromParts → submitBooking (reserve + audit + request notice) → reply
 * DOCS:
 *  - CommandInteraction options: https://discord.js.org/#/docs/discord.js/main/class/CommandInteractionOptionResolver
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { MAX_COORDS_LENGTH, MAX_IGN_LENGTH } from "../lib/constants.js";
import { env } from "../lib/env.js";
import { now, slotKeyFromParts } from "../lib/time.js";
import { describeBookingResult, submitBooking } from "../features/bookingRequest.js";
import { getActiveNotifier } from "../features/notifier.js";
import { isPrivileged } from "../utils/permissions.js";
import { dateOption, resolveTitle, timeOption, titleOption, unknownTitleMessage } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("schedule")
  .setDescription(`Book a title for one ${env.SHIFT_HOURS}-hour shift.`)
  .addStringOption(titleOption)
  .addStringOption((o) =>
    o.setName("ign").setDescription("In-game name").setRequired(true).setMaxLength(MAX_IGN_LENGTH)
  )
  .addStringOption(dateOption)
  .addStringOption(timeOption)
  .addStringOption((o) =>
    o.setName("coords").setDescription("In-game coordinates").setRequired(false).setMaxLength(MAX_COORDS_LENGTH)
  );

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction } = ctx;
  const titleInput = interaction.options.getString("title", true);
  const ign = interaction.options.getString("ign", true);
  const coords = interaction.options.getString("coords") ?? "";

  const entry = resolveTitle(titleInput);
  if (!entry) {
    await replyOrEdit(interaction, { content: unknownTitleMessage(titleInput) });
    return;
  }

  const slot = await withStep(ctx, "parse_slot", () =>
    slotKeyFromParts(interaction.options.getString("date", true), interaction.options.getString("time", true))
  );

  const result = await withStep(ctx, "reserve", () => {
    ctx.setLastOp("reserveSlot");
    return submitBooking(
      {
        titleName: entry.name,
        ign,
        coords,
        slotKey: slot,
        submittedBy: interaction.user.tag,
        privileged: isPrivileged(interaction),
      },
      {
        now: now(),
        shiftHours: env.SHIFT_HOURS,
        auditPath: env.AUDIT_CSV_PATH,
        notifier: getActiveNotifier(),
        notifyTimeoutMs: env.NOTIFY_TIMEOUT_MS,
      }
    );
  });

  await withStep(ctx, "reply", () =>
    replyOrEdit(interaction, { content: describeBookingResult(result, entry.name, slot) })
  );
}

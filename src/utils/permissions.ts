/**
 * Titlekeeper — src/utils/permissions.ts
 * WHAT: Who may manage titles, and who the requester is when cancelling.
 * FLOWS:
 *  - isPrivileged: bot owner → guild owner → Administrator permission
 *  - requesterIdentity: member display name (matched against reserver IGNs)
 * DOCS:
 *  - Discord permissions: https://discord.com/developers/docs/topics/permissions
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { PermissionFlagsBits, type ChatInputCommandInteraction } from "discord.js";
import { isOwner } from "./owner.js";

/**
 * PERMISSION HIERARCHY (any one grants access):
 *   1. Bot owner (OWNER_IDS in env)
 *   2. Guild owner
 *   3. Administrator permission in the invoking channel
 */
export function isPrivileged(interaction: ChatInputCommandInteraction): boolean {
  const userId = interaction.user.id;

  if (isOwner(userId)) {
    return true;
  }

  if (!interaction.guildId) {
    return false;
  }

  if (interaction.guild?.ownerId === userId) {
    return true;
  }

  return interaction.memberPermissions?.has(PermissionFlagsBits.Administrator) ?? false;
}

/**
 * Players are told to use their in-game name as their server nickname, so the
 * display name is the identity compared with a reservation's IGN.
 */
export function requesterIdentity(interaction: ChatInputCommandInteraction): string {
  const member = interaction.member;
  if (member && "displayName" in member) {
    return member.displayName;
  }
  return member?.nick ?? interaction.user.globalName ?? interaction.user.username;
}

/**
 * Titlekeeper — src/utils/owner.ts
 * WHAT: Bot-owner override for privileged title commands.
 * FLOWS: OWNER_IDS (comma-separated user ids) → isOwner(userId)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { env } from "../lib/env.js";

export function parseOwnerIds(raw: string | undefined): string[] {
  return raw
    ? raw
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0)
    : [];
}

const ownerIds = parseOwnerIds(env.OWNER_IDS);

export function isOwner(userId: string): boolean {
  return ownerIds.includes(userId);
}

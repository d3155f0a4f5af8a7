/**
 * Titlekeeper — src/commands/shared.ts
 * WHAT: Option builders and lookups shared by the title commands.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { SlashCommandStringOption } from "discord.js";
import { findCatalogEntry, type CatalogEntry } from "../config/catalog.js";
import { getCatalog } from "../store/titleStore.js";

export function titleOption(option: SlashCommandStringOption): SlashCommandStringOption {
  return option.setName("title").setDescription("Title name, e.g. Architect").setRequired(true);
}

export function dateOption(option: SlashCommandStringOption): SlashCommandStringOption {
  return option.setName("date").setDescription("Date (UTC), YYYY-MM-DD").setRequired(true);
}

export function timeOption(option: SlashCommandStringOption): SlashCommandStringOption {
  return option.setName("time").setDescription("Shift start (UTC), HH:MM").setRequired(true);
}

/**
 * Case-insensitive catalog lookup against the catalog the store was initialized with.
 */
export function resolveTitle(input: string): CatalogEntry | undefined {
  return findCatalogEntry(getCatalog(), input);
}

export function unknownTitleMessage(input: string): string {
  const names = getCatalog()
    .map((entry) => entry.name)
    .join(", ");
  return `Unknown title "${input}". Valid titles: ${names}.`;
}

/**
 * Titlekeeper — src/config/catalog.ts
 * WHAT: The static title catalog: valid names, display order, effect text and
 *       which titles are open to general (non-privileged) requests.
 * FLOWS: read config/titles.json → zod validate → Catalog (array order = display order)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import { z } from "zod";

const catalogEntrySchema = z.object({
  name: z.string().trim().min(1, "title name must not be empty"),
  effects: z.string().default(""),
  iconFile: z.string().optional(),
  requestable: z.boolean().default(false),
});

const catalogSchema = z
  .array(catalogEntrySchema)
  .min(1, "catalog must list at least one title")
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      const key = entry.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "name"],
          message: `duplicate title "${entry.name}"`,
        });
      }
      seen.add(key);
    });
  });

export type CatalogEntry = z.infer<typeof catalogEntrySchema>;
export type Catalog = readonly CatalogEntry[];

export function parseCatalog(raw: unknown): Catalog {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid title catalog:\n${issues}`);
  }
  return parsed.data;
}

export function loadCatalog(filePath: string): Catalog {
  const text = fs.readFileSync(filePath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`Title catalog ${filePath} is not valid JSON`, { cause: err });
  }
  return parseCatalog(raw);
}

/**
 * Case-insensitive lookup used by the chat and web surfaces, so "architect"
 * resolves to the canonical "Architect".
 */
export function findCatalogEntry(catalog: Catalog, input: string): CatalogEntry | undefined {
  const needle = input.trim().toLowerCase();
  return catalog.find((entry) => entry.name.toLowerCase() === needle);
}

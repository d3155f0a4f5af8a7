// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Aggregates every slash command definition for bulk registration with Discord.
// buildCommands() returns the JSON payloads PUT to the guild commands endpoint.
//
// GOTCHA: Discord caches slash commands. Guild commands update instantly; global
// commands can take up to an hour, so registration here is guild-scoped.

import { data as titlesData } from "./titles.js";
import { data as scheduleData } from "./schedule.js";
import { data as unscheduleData } from "./unschedule.js";
import { data as assignData } from "./assign.js";
import { data as releaseData } from "./release.js";

export function buildCommands() {
  return [
    // Everyone
    titlesData.toJSON(),
    scheduleData.toJSON(),
    unscheduleData.toJSON(),

    // Administrators / owners (checked at execution time)
    assignData.toJSON(),
    releaseData.toJSON(),
  ];
}

/**
 * Looks a person up on Wikipedia and prints a short summary card.
 *
 * Usage:
 *   npx tsx scripts/search.ts "Ada Lovelace"
 *
 * Options:
 *   --timeline   Append the compact card timeline
 */

import { formatSummaryCard, formatTimelineTable } from "@/lib/profile-format";
import { describeFailure } from "@/lib/result";
import { CARD_MAX_EVENTS } from "@/lib/timeline-extraction";
import { createBiographyService } from "./shared/biography-service";
import { loadConfig } from "./shared/config";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const name = args
    .filter((arg) => !arg.startsWith("--"))
    .join(" ")
    .trim();
  if (!name) {
    throw new Error('Usage: search.ts "<person name>" [--timeline]');
  }

  const service = createBiographyService(loadConfig());
  const summary = await service.searchPerson(name);

  if (!summary.ok) {
    console.error(describeFailure(summary));
    process.exitCode = summary.reason === "not-found" ? 2 : 1;
    return;
  }

  console.log(formatSummaryCard(summary.value));

  if (args.includes("--timeline")) {
    const profile = await service.loadProfile(summary.value.title, CARD_MAX_EVENTS);
    console.log(
      profile.ok
        ? formatTimelineTable(profile.value.timeline)
        : describeFailure(profile),
    );
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});

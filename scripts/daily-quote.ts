/**
 * Prints today's inspiration: Wikiquote's quote of the day, or a random
 * quote from the rotating list in data/people.json when the feed is down.
 *
 * Usage:
 *   npx tsx scripts/daily-quote.ts
 */

import { createBiographyService } from "./shared/biography-service";
import { loadConfig } from "./shared/config";

async function main(): Promise<void> {
  const service = createBiographyService(loadConfig());
  const inspiration = await service.dailyInspiration();

  if (inspiration.quote) {
    console.log(`**${inspiration.author}** — “${inspiration.quote}”`);
  } else {
    console.log(`**${inspiration.author}** — Inspiration for your day.`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});

/**
 * Lists the featured people from data/people.json with a short summary
 * snippet and the command that opens each full profile.
 *
 * Usage:
 *   npx tsx scripts/featured.ts
 */

import { formatFeaturedCards } from "@/lib/profile-format";
import { createBiographyService } from "./shared/biography-service";
import { loadConfig } from "./shared/config";

async function main(): Promise<void> {
  const service = createBiographyService(loadConfig());

  console.error("Loading featured people...");
  const summaries = await service.featuredPeople();

  console.log(formatFeaturedCards(summaries));
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});

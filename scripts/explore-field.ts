/**
 * Lists notable people whose Wikidata occupation matches a field.
 *
 * Usage:
 *   npx tsx scripts/explore-field.ts Science --limit 18
 *   npx tsx scripts/explore-field.ts --list
 *
 * Options:
 *   --limit N   Maximum people (1-60, default 18)
 *   --list      Print the known fields and exit
 */

import { getFields } from "@/lib/catalog";
import { formatPersonCards } from "@/lib/profile-format";
import { describeFailure } from "@/lib/result";
import { createBiographyService } from "./shared/biography-service";
import { loadConfig } from "./shared/config";

const DEFAULT_LIMIT = 18;

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes("--list")) {
    console.log(getFields().join("\n"));
    return;
  }

  const limitIdx = args.indexOf("--limit");
  const limit = limitIdx !== -1 ? parseInt(args[limitIdx + 1], 10) : DEFAULT_LIMIT;
  if (Number.isNaN(limit)) {
    throw new Error("--limit expects a number");
  }
  const field = args
    .filter(
      (arg, index) => !arg.startsWith("--") && (limitIdx === -1 || index !== limitIdx + 1),
    )
    .join(" ")
    .trim();

  if (!field) {
    throw new Error(`Usage: explore-field.ts <field> [--limit N]. Fields: ${getFields().join(", ")}`);
  }

  console.error(`Querying Wikidata for ${field}...`);
  const service = createBiographyService(loadConfig());
  const cards = await service.exploreField(field, limit);

  if (!cards.ok) {
    console.error(describeFailure(cards));
    process.exitCode = 1;
    return;
  }

  console.log(formatPersonCards(cards.value));
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});

/**
 * Asks the generative-text model to compare two people.
 *
 * Usage:
 *   GROQ_API_KEY=... npx tsx scripts/compare.ts "Marie Curie" "Ada Lovelace"
 *
 * Options:
 *   --lessons   Print life lessons for the first person instead
 */

import { describeFailure } from "@/lib/result";
import { createBiographyService } from "./shared/biography-service";
import { loadConfig } from "./shared/config";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const names = args.filter((arg) => !arg.startsWith("--"));
  const service = createBiographyService(loadConfig());

  if (args.includes("--lessons")) {
    if (names.length < 1) throw new Error('Usage: compare.ts "<name>" --lessons');
    const lessons = await service.lessonsFrom(names[0]);
    if (!lessons.ok) {
      console.error(describeFailure(lessons));
      process.exitCode = 1;
      return;
    }
    console.log(lessons.value);
    return;
  }

  if (names.length !== 2) {
    throw new Error('Usage: compare.ts "<first name>" "<second name>"');
  }

  const comparison = await service.comparePeople(names[0], names[1]);
  if (!comparison.ok) {
    console.error(describeFailure(comparison));
    process.exitCode = 1;
    return;
  }

  console.log(comparison.value);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});

/**
 * Prints a person's profile: snapshot, heuristic timeline, quotes and
 * notable works, pulled from Wikipedia, Wikiquote and Wikidata.
 *
 * Usage:
 *   npx tsx scripts/profile.ts "Marie Curie"
 *
 * Options:
 *   --max-events N   Timeline length (default LUMINARIES_MAX_EVENTS or 10)
 *   --json           Print the profile as JSON instead of markdown
 */

import { formatProfile } from "@/lib/profile-format";
import { describeFailure } from "@/lib/result";
import { isFavorite, selectPerson } from "@/lib/session";
import { createBiographyService } from "./shared/biography-service";
import { loadConfig } from "./shared/config";
import { loadSession, saveSession } from "./shared/session-store";

function parseArgs(args: string[]): {
  name: string;
  maxEvents: number | undefined;
  json: boolean;
} {
  const maxIdx = args.indexOf("--max-events");
  const maxEvents = maxIdx !== -1 ? parseInt(args[maxIdx + 1], 10) : undefined;
  if (maxEvents !== undefined && Number.isNaN(maxEvents)) {
    throw new Error("--max-events expects a number");
  }

  const name = args
    .filter(
      (arg, index) => !arg.startsWith("--") && (maxIdx === -1 || index !== maxIdx + 1),
    )
    .join(" ")
    .trim();

  if (!name) {
    throw new Error('Usage: profile.ts "<person name>" [--max-events N] [--json]');
  }

  return { name, maxEvents, json: args.includes("--json") };
}

async function main(): Promise<void> {
  const { name, maxEvents, json } = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const service = createBiographyService(config);

  console.error(`Looking up ${name}...`);
  const profile = await service.loadProfile(name, maxEvents);

  if (!profile.ok) {
    console.error(describeFailure(profile));
    process.exitCode = profile.reason === "not-found" ? 2 : 1;
    return;
  }

  const session = loadSession(config.sessionFile);
  saveSession(config.sessionFile, selectPerson(session, profile.value.name));
  if (isFavorite(session, profile.value.name)) {
    console.error(`${profile.value.name} is in your favorites.`);
  }

  console.log(
    json ? JSON.stringify(profile.value, null, 2) : formatProfile(profile.value),
  );
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});

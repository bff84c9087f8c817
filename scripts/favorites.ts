/**
 * Manages the favorites list and interests kept in the session file.
 *
 * Usage:
 *   npx tsx scripts/favorites.ts list
 *   npx tsx scripts/favorites.ts add "Marie Curie"
 *   npx tsx scripts/favorites.ts remove "Marie Curie"
 *   npx tsx scripts/favorites.ts interests "Science, Philosophy"
 */

import { addFavorite, removeFavorite, setInterests } from "@/lib/session";
import { loadConfig } from "./shared/config";
import { loadSession, saveSession } from "./shared/session-store";

function main(): void {
  const [command, ...rest] = process.argv.slice(2);
  const name = rest.join(" ").trim();
  const config = loadConfig();
  const session = loadSession(config.sessionFile);

  switch (command) {
    case "add":
    case "remove": {
      if (!name) throw new Error(`Usage: favorites.ts ${command} "<person name>"`);
      const next =
        command === "add" ? addFavorite(session, name) : removeFavorite(session, name);
      saveSession(config.sessionFile, next);
      console.log(
        next === session
          ? `No change: ${name} ${command === "add" ? "is already" : "is not"} a favorite.`
          : `${command === "add" ? "Added" : "Removed"} ${name}.`,
      );
      return;
    }
    case "interests": {
      const next = setInterests(session, name ? name.split(",") : []);
      saveSession(config.sessionFile, next);
      console.log(
        next.interests.length > 0
          ? `Interests: ${next.interests.join(", ")}`
          : "Interests cleared.",
      );
      return;
    }
    case "list":
    case undefined:
      if (session.interests.length > 0) {
        console.log(`Interests: ${session.interests.join(", ")}`);
      }
      if (session.favorites.length === 0) {
        console.log("No favorites yet.");
        return;
      }
      session.favorites.forEach((favorite, index) => {
        console.log(`${index + 1}. ${favorite}`);
      });
      return;
    default:
      throw new Error(`Unknown command "${command}". Use add, remove, interests or list.`);
  }
}

try {
  main();
} catch (error) {
  console.error(error);
  process.exit(1);
}

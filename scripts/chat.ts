/**
 * Interactive role-play chat with a historical figure. The conversation
 * is kept in the session file, so it resumes on the next run.
 *
 * Usage:
 *   GROQ_API_KEY=... npx tsx scripts/chat.ts "Albert Einstein"
 *
 * Type /reset to forget the conversation, /quit to leave.
 */

import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import { describeFailure } from "@/lib/result";
import {
  chatHistory,
  clearChat,
  endRoleplay,
  startRoleplay,
} from "@/lib/session";
import { createBiographyService } from "./shared/biography-service";
import { loadConfig } from "./shared/config";
import { loadSession, saveSession } from "./shared/session-store";

async function main(): Promise<void> {
  const config = loadConfig();
  let session = loadSession(config.sessionFile);
  const name = process.argv.slice(2).join(" ").trim() || session.roleplayPerson;

  if (!name) {
    throw new Error('Usage: chat.ts "<person name>"');
  }

  const service = createBiographyService(config);
  session = startRoleplay(session, name);
  saveSession(config.sessionFile, session);

  const previous = chatHistory(session, name).length;
  console.log(
    `Chatting with ${name}${previous > 0 ? ` (${previous} earlier messages)` : ""}. /reset to start over, /quit to leave.`,
  );

  const rl = createInterface({ input, output });

  try {
    for (;;) {
      const line = (await rl.question("you> ")).trim();
      if (!line) continue;
      if (line === "/quit") break;

      if (line === "/reset") {
        session = clearChat(session, name);
        saveSession(config.sessionFile, session);
        console.log("Conversation cleared.");
        continue;
      }

      const turn = await service.roleplayReply(session, name, line);
      if (!turn.ok) {
        console.error(describeFailure(turn));
        if (turn.reason === "unavailable") break;
        continue;
      }

      session = turn.value.session;
      saveSession(config.sessionFile, session);
      console.log(`${name}> ${turn.value.reply}`);
    }
  } finally {
    rl.close();
    saveSession(config.sessionFile, endRoleplay(session));
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});

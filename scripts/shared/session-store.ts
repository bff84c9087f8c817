import { existsSync, readFileSync, writeFileSync } from "node:fs";

import {
  createSession,
  sessionStateSchema,
  type SessionState,
} from "@/lib/session";

export function loadSession(filePath: string): SessionState {
  if (!existsSync(filePath)) return createSession();

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new Error(`Session file ${filePath} is not valid JSON: ${error}`);
  }

  const parsed = sessionStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid session file ${filePath}: ${parsed.error.message}`);
  }

  return parsed.data;
}

export function saveSession(filePath: string, state: SessionState): void {
  writeFileSync(filePath, JSON.stringify(state, null, 2) + "\n", "utf-8");
}

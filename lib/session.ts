import { z } from "zod";

export const chatMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});
export type ChatMessage = z.infer<typeof chatMessageSchema>;

export const sessionStateSchema = z.object({
  favorites: z.array(z.string().min(1)),
  selectedPerson: z.string().min(1).nullable(),
  roleplayPerson: z.string().min(1).nullable(),
  interests: z.array(z.string().min(1)),
  chats: z.record(z.string(), z.array(chatMessageSchema)),
});
export type SessionState = z.infer<typeof sessionStateSchema>;

export const MAX_CHAT_HISTORY = 40;

export function createSession(): SessionState {
  return {
    favorites: [],
    selectedPerson: null,
    roleplayPerson: null,
    interests: [],
    chats: {},
  };
}

function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, " ");
}

export function addFavorite(state: SessionState, name: string): SessionState {
  const normalized = normalizeName(name);
  if (!normalized || state.favorites.includes(normalized)) {
    return state;
  }

  return { ...state, favorites: [...state.favorites, normalized] };
}

export function removeFavorite(
  state: SessionState,
  name: string,
): SessionState {
  const normalized = normalizeName(name);
  if (!state.favorites.includes(normalized)) {
    return state;
  }

  return {
    ...state,
    favorites: state.favorites.filter((favorite) => favorite !== normalized),
  };
}

export function isFavorite(state: SessionState, name: string): boolean {
  return state.favorites.includes(normalizeName(name));
}

export function selectPerson(
  state: SessionState,
  name: string | null,
): SessionState {
  const selectedPerson = name === null ? null : normalizeName(name) || null;
  return { ...state, selectedPerson };
}

export function startRoleplay(state: SessionState, name: string): SessionState {
  const normalized = normalizeName(name);
  if (!normalized) return state;

  return { ...state, roleplayPerson: normalized };
}

export function endRoleplay(state: SessionState): SessionState {
  return { ...state, roleplayPerson: null };
}

export function setInterests(
  state: SessionState,
  interests: string[],
): SessionState {
  const unique = [
    ...new Set(interests.map((interest) => interest.trim()).filter(Boolean)),
  ];
  return { ...state, interests: unique };
}

export function chatHistory(state: SessionState, name: string): ChatMessage[] {
  return state.chats[normalizeName(name)] ?? [];
}

/** Appends a turn, keeping only the most recent {@link MAX_CHAT_HISTORY}. */
export function appendChatMessage(
  state: SessionState,
  name: string,
  message: ChatMessage,
): SessionState {
  const key = normalizeName(name);
  const history = [...(state.chats[key] ?? []), message].slice(
    -MAX_CHAT_HISTORY,
  );

  return { ...state, chats: { ...state.chats, [key]: history } };
}

export function clearChat(state: SessionState, name: string): SessionState {
  const key = normalizeName(name);
  if (!(key in state.chats)) return state;

  const chats = { ...state.chats };
  delete chats[key];
  return { ...state, chats };
}

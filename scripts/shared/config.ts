import { z } from "zod";

export const DEFAULT_USER_AGENT = "luminaries/1.0 (biography toolkit)";

const configSchema = z.object({
  groqApiKey: z.string().min(1).nullable(),
  groqModel: z.string().min(1),
  userAgent: z.string().min(1),
  timeoutMs: z.number().int().positive(),
  maxEvents: z.number().int().positive(),
  cacheTtlHours: z.number().positive(),
  sessionFile: z.string().min(1),
});

export type AppConfig = z.infer<typeof configSchema>;

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(): AppConfig {
  const parsed = configSchema.safeParse({
    groqApiKey: process.env.GROQ_API_KEY || null,
    groqModel: process.env.GROQ_MODEL || "llama-3.3-70b-versatile",
    userAgent: process.env.LUMINARIES_USER_AGENT || DEFAULT_USER_AGENT,
    timeoutMs: numberFromEnv("LUMINARIES_TIMEOUT_MS", 20_000),
    maxEvents: numberFromEnv("LUMINARIES_MAX_EVENTS", 10),
    cacheTtlHours: numberFromEnv("LUMINARIES_CACHE_TTL_HOURS", 12),
    sessionFile:
      process.env.LUMINARIES_SESSION_FILE || ".luminaries-session.json",
  });

  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.message}`);
  }

  return parsed.data;
}

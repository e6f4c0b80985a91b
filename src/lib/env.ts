import { z } from "zod";

export const DEFAULT_CHAT_PERSONA = [
  "You are an expert disaster-response assistant.",
  "Answer briefly and practically: preparedness, evacuation, first aid, shelter and recovery.",
  "If a question needs local authorities or emergency services, say so clearly.",
].join(" ");

const EnvSchema = z
  .object({
    OPENAI_API_KEY: z.string().min(1),
    OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
    OPENWEATHER_API_KEY: z.string().min(1),
    APP_USER_AGENT: z.string().min(10),

    // Optional
    OPENWEATHER_BASE_URL: z.string().url().default("https://api.openweathermap.org"),
    NOMINATIM_BASE_URL: z.string().url().default("https://nominatim.openstreetmap.org"),
    GCS_BUCKET: z.string().min(3).optional(),
    GOOGLE_CLOUD_PROJECT: z.string().min(1).optional(),
    HTTP_TIMEOUT_MS: z.coerce.number().int().min(1000).max(60000).default(12000),
    RISK_MEDIUM_THRESHOLD: z.coerce.number().int().min(1).max(100).default(34),
    RISK_HIGH_THRESHOLD: z.coerce.number().int().min(1).max(100).default(67),
    CHAT_SYSTEM_PROMPT: z.string().min(1).optional(),
    CHAT_HISTORY_LIMIT: z.coerce.number().int().min(0).max(200).default(20),
  })
  .refine((e) => e.RISK_MEDIUM_THRESHOLD < e.RISK_HIGH_THRESHOLD, {
    message: "RISK_MEDIUM_THRESHOLD must be lower than RISK_HIGH_THRESHOLD",
    path: ["RISK_MEDIUM_THRESHOLD"],
  });

export type RiskThresholds = { medium: number; high: number };

export type AppConfig = {
  openai: { apiKey: string; model: string };
  weather: { apiKey: string; baseUrl: string };
  geocoding: { baseUrl: string; userAgent: string };
  storage: { bucket: string | null; projectId: string | null };
  timeoutMs: number;
  risk: RiskThresholds;
  chat: { persona: string; historyLimit: number };
};

/** Empty strings count as unset, the way `.env` files usually leave them. */
function blankToUndefined(source: NodeJS.ProcessEnv) {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === "string" && value.trim() !== "") out[key] = value.trim();
  }
  return out;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(source));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const env = parsed.data;

  return {
    openai: { apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL },
    weather: { apiKey: env.OPENWEATHER_API_KEY, baseUrl: env.OPENWEATHER_BASE_URL },
    geocoding: { baseUrl: env.NOMINATIM_BASE_URL, userAgent: env.APP_USER_AGENT },
    storage: { bucket: env.GCS_BUCKET ?? null, projectId: env.GOOGLE_CLOUD_PROJECT ?? null },
    timeoutMs: env.HTTP_TIMEOUT_MS,
    risk: { medium: env.RISK_MEDIUM_THRESHOLD, high: env.RISK_HIGH_THRESHOLD },
    chat: { persona: env.CHAT_SYSTEM_PROMPT ?? DEFAULT_CHAT_PERSONA, historyLimit: env.CHAT_HISTORY_LIMIT },
  };
}

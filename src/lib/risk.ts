import { z } from "zod";
import type { RiskThresholds } from "@/lib/env";
import { MalformedResponseError } from "@/lib/errors";
import type { RiskAssessment, RiskLevel, WeatherSnapshot } from "@/lib/types";

export const DEFAULT_THRESHOLDS: RiskThresholds = { medium: 34, high: 67 };

export function clampScore(value: number) {
  return Math.min(100, Math.max(0, Math.round(value)));
}

export function levelForScore(score: number, thresholds: RiskThresholds = DEFAULT_THRESHOLDS): RiskLevel {
  if (score < thresholds.medium) return "Low";
  if (score < thresholds.high) return "Medium";
  return "High";
}

export function riskPrompt(weather: WeatherSnapshot) {
  return `
You are an AI Disaster Risk Analyst. Analyze the following environmental conditions and return a JSON object EXACTLY like:
{"risk_level":"Low|Medium|High", "risk_score": <0-100 integer>, "recommendation":"one-line advice"}

Data:
Temperature: ${weather.temperature} °C
Humidity: ${weather.humidity} %
Rainfall: ${weather.rainfall} mm
Wind Speed: ${weather.wind_speed} m/s
`.trim();
}

const RiskReplySchema = z.object({
  risk_score: z.union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())]),
  risk_level: z.string().optional(),
  recommendation: z.string().trim().min(1),
});

function extractJsonObject(text: string) {
  const cleaned = text.replace(/```(?:json)?/gi, "").trim();
  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return cleaned.slice(start, end + 1);
}

/**
 * Turns the model's reply into a RiskAssessment. The level is always derived
 * from the clamped score, whatever label the model chose.
 */
export function parseRiskReply(text: string, thresholds: RiskThresholds = DEFAULT_THRESHOLDS): RiskAssessment {
  const raw = extractJsonObject(text);
  if (!raw) throw new MalformedResponseError("no JSON object in reply");

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new MalformedResponseError("reply JSON did not parse", { cause: e });
  }

  const parsed = RiskReplySchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedResponseError(`${issue?.path.join(".") || "reply"}: ${issue?.message ?? "invalid shape"}`);
  }

  const score = parsed.data.risk_score;
  if (!Number.isFinite(score)) throw new MalformedResponseError("risk_score is not a finite number");

  const risk_score = clampScore(score);
  return {
    risk_score,
    risk_level: levelForScore(risk_score, thresholds),
    recommendation: parsed.data.recommendation,
  };
}

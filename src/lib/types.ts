import { z } from "zod";

export const RISK_LEVELS = ["Low", "Medium", "High"] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export type Coordinates = { lat: number; lon: number };

export type WeatherSnapshot = {
  temperature: number;
  humidity: number;
  wind_speed: number;
  rainfall: number;
};

export type RiskAssessment = {
  risk_score: number;
  risk_level: RiskLevel;
  recommendation: string;
};

export const AnalysisRecordSchema = z.object({
  id: z.string().min(1),
  location_name: z.string().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  temperature: z.number(),
  humidity: z.number(),
  wind_speed: z.number(),
  rainfall: z.number(),
  risk_score: z.number().int().min(0).max(100),
  risk_level: z.enum(RISK_LEVELS),
  recommendation: z.string().min(1),
  timestamp: z.string().datetime(),
});

export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;

export type AnalysisResult = { record: AnalysisRecord; stored: boolean };

/** Map marker shape consumed by the dashboard. */
export type PointSummary = Pick<AnalysisRecord, "id" | "location_name" | "risk_score" | "risk_level" | "timestamp"> & {
  location: string;
  lat: number;
  lon: number;
};

export const ChatEntrySchema = z.object({
  role: z.enum(["user", "assistant"]),
  text: z.string(),
  timestamp: z.string().datetime(),
});

export type ChatEntry = z.infer<typeof ChatEntrySchema>;

export const ChatSessionSchema = z.object({
  session_id: z.string().min(1),
  messages: z.array(ChatEntrySchema),
  updated_at: z.string().datetime().nullable(),
});

export type ChatSession = z.infer<typeof ChatSessionSchema>;

export type ChatResult = { reply: string; sessionId: string };

// Capabilities consumed from upstream services.

export interface WeatherClient {
  current(lat: number, lon: number): Promise<WeatherSnapshot>;
}

export interface Geocoder {
  /** Never rejects: falls back to a coordinate label. */
  placeName(lat: number, lon: number): Promise<string>;
}

export interface RiskAssessor {
  assess(weather: WeatherSnapshot): Promise<RiskAssessment>;
}

export type AssistantTurn = { role: "user" | "assistant"; content: string };

export interface Assistant {
  reply(instructions: string, turns: AssistantTurn[]): Promise<string>;
}

// Wire shapes.

export type AnalyzeResponse = AnalysisRecord & { location: string; stored: boolean };

export type ChatResponse = { reply: string; session_id: string };

export type ExplainResponse = { id: string; explanation: string };

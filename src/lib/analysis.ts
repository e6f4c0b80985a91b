import { randomUUID } from "node:crypto";
import { NotFoundError, StorageUnavailableError } from "@/lib/errors";
import { assertCoordinates } from "@/lib/geo";
import type { AnalysisStore } from "@/lib/storage/analysisStore";
import type {
  AnalysisRecord,
  AnalysisResult,
  Assistant,
  Geocoder,
  RiskAssessor,
  WeatherClient,
} from "@/lib/types";

export type AnalysisDeps = {
  weather: WeatherClient;
  geocoder: Geocoder;
  risk: RiskAssessor;
  assistant: Assistant;
  store: AnalysisStore;
  now?: () => Date;
  newId?: () => string;
};

function explainPrompt(record: AnalysisRecord) {
  const data = {
    temperature: record.temperature,
    humidity: record.humidity,
    wind_speed: record.wind_speed,
    rainfall: record.rainfall,
  };
  const report = {
    risk_level: record.risk_level,
    risk_score: record.risk_score,
    recommendation: record.recommendation,
  };
  return [
    `Location: ${record.location_name}`,
    `Given this data: ${JSON.stringify(data)}`,
    `And the AI risk report: ${JSON.stringify(report)}`,
    "Explain in 2-3 sentences WHY that risk level was assigned and give 2 practical actions for the local community.",
  ].join("\n");
}

export class AnalysisOrchestrator {
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly deps: AnalysisDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  /**
   * Weather and place name are fetched concurrently; the geocoder never
   * rejects, so only weather or risk failures abort the analysis.
   */
  async analyze(lat: number, lon: number): Promise<AnalysisResult> {
    assertCoordinates(lat, lon);

    const [weather, locationName] = await Promise.all([
      this.deps.weather.current(lat, lon),
      this.deps.geocoder.placeName(lat, lon),
    ]);
    const risk = await this.deps.risk.assess(weather);

    const record: AnalysisRecord = {
      id: this.newId(),
      location_name: locationName,
      latitude: lat,
      longitude: lon,
      ...weather,
      ...risk,
      timestamp: this.now().toISOString(),
    };

    try {
      await this.deps.store.save(record);
      return { record, stored: true };
    } catch (e) {
      if (!(e instanceof StorageUnavailableError)) throw e;
      console.warn(`[analyze] record ${record.id} not persisted: ${e.message}`);
      return { record, stored: false };
    }
  }

  async explain(id: string): Promise<string> {
    const record = await this.deps.store.get(id);
    if (!record) throw new NotFoundError("Point not found");

    return this.deps.assistant.reply("You are an interpreter of disaster risk reports.", [
      { role: "user", content: explainPrompt(record) },
    ]);
  }
}

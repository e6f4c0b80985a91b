import { AnalysisOrchestrator } from "@/lib/analysis";
import { ChatOrchestrator } from "@/lib/chat";
import { loadConfig, type AppConfig } from "@/lib/env";
import { OpenAIChat } from "@/lib/openai";
import { AnalysisStore } from "@/lib/storage/analysisStore";
import { GcsObjectStore, MemoryObjectStore, type ObjectStore } from "@/lib/storage/objectStore";
import { AIAssistant } from "@/lib/tools/assistant";
import { OpenWeatherClient } from "@/lib/tools/currentWeather";
import { AIRiskAssessor } from "@/lib/tools/riskAssessment";
import { NominatimGeocoder } from "@/lib/tools/reverseGeocode";

export type Services = {
  config: AppConfig;
  store: AnalysisStore;
  analysis: AnalysisOrchestrator;
  chat: ChatOrchestrator;
};

export function buildServices(config: AppConfig): Services {
  let objects: ObjectStore;
  if (config.storage.bucket) {
    objects = new GcsObjectStore(config.storage.bucket, config.storage.projectId);
  } else {
    console.warn("[services] GCS_BUCKET is not set; analyses and chats are kept in memory only");
    objects = new MemoryObjectStore();
  }

  const store = new AnalysisStore(objects);
  const completer = new OpenAIChat({ apiKey: config.openai.apiKey, timeoutMs: config.timeoutMs }, config.openai.model);
  const assistant = new AIAssistant(completer);

  const analysis = new AnalysisOrchestrator({
    weather: new OpenWeatherClient({ ...config.weather, timeoutMs: config.timeoutMs }),
    geocoder: new NominatimGeocoder({ ...config.geocoding, timeoutMs: config.timeoutMs }),
    risk: new AIRiskAssessor(completer, config.risk),
    assistant,
    store,
  });

  const chat = new ChatOrchestrator({
    assistant,
    store,
    persona: config.chat.persona,
    historyLimit: config.chat.historyLimit,
  });

  return { config, store, analysis, chat };
}

let services: Services | null = null;

/** Built on first use so `next build` does not need the runtime environment. */
export function getServices(): Services {
  if (!services) services = buildServices(loadConfig());
  return services;
}

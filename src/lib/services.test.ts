import { describe, expect, it, vi } from "vitest";
import { AnalysisOrchestrator } from "@/lib/analysis";
import { ChatOrchestrator } from "@/lib/chat";
import { loadConfig } from "@/lib/env";
import { buildServices } from "@/lib/services";

describe("buildServices", () => {
  it("falls back to the in-memory store without a bucket", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const config = loadConfig({
      OPENAI_API_KEY: "test-openai-key",
      OPENWEATHER_API_KEY: "test-weather-key",
      APP_USER_AGENT: "risk-tests/1.0 (test@example.org)",
    });

    const services = buildServices(config);

    expect(services.analysis).toBeInstanceOf(AnalysisOrchestrator);
    expect(services.chat).toBeInstanceOf(ChatOrchestrator);
    expect(warn).toHaveBeenCalledWith(
      "[services] GCS_BUCKET is not set; analyses and chats are kept in memory only"
    );
    await expect(services.store.list()).resolves.toEqual([]);
  });
});

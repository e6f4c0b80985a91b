import { describe, expect, it, vi } from "vitest";
import { MalformedResponseError, UpstreamUnavailableError } from "@/lib/errors";
import type { ChatCompleter, CompletionRequest } from "@/lib/openai";
import { AIRiskAssessor } from "@/lib/tools/riskAssessment";

const WEATHER = { temperature: 32, humidity: 80, wind_speed: 5, rainfall: 50 };

function completerReplying(reply: string) {
  const complete = vi.fn(async (_request: CompletionRequest) => reply);
  const completer: ChatCompleter = { complete };
  return { completer, complete };
}

describe("AIRiskAssessor", () => {
  it("asks for JSON and returns the parsed assessment", async () => {
    const { completer, complete } = completerReplying(
      '{"risk_level":"High","risk_score":72,"recommendation":"Evacuate low-lying areas"}'
    );

    await expect(new AIRiskAssessor(completer, { medium: 34, high: 67 }).assess(WEATHER)).resolves.toEqual({
      risk_score: 72,
      risk_level: "High",
      recommendation: "Evacuate low-lying areas",
    });

    const [request] = complete.mock.calls[0];
    expect(request.json).toBe(true);
    expect(request.messages[1]).toMatchObject({ role: "user" });
    expect(JSON.stringify(request.messages[1])).toContain("Rainfall: 50 mm");
  });

  it("surfaces an unparseable reply instead of scoring it", async () => {
    const { completer } = completerReplying("I think the risk is moderate.");

    await expect(new AIRiskAssessor(completer, { medium: 34, high: 67 }).assess(WEATHER)).rejects.toBeInstanceOf(
      MalformedResponseError
    );
  });

  it("propagates upstream failures", async () => {
    const completer: ChatCompleter = {
      complete: async () => {
        throw new UpstreamUnavailableError("AI service", "HTTP 500");
      },
    };

    await expect(new AIRiskAssessor(completer, { medium: 34, high: 67 }).assess(WEATHER)).rejects.toBeInstanceOf(
      UpstreamUnavailableError
    );
  });
});

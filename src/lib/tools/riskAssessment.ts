import type { RiskThresholds } from "@/lib/env";
import type { ChatCompleter } from "@/lib/openai";
import { parseRiskReply, riskPrompt } from "@/lib/risk";
import type { RiskAssessment, RiskAssessor, WeatherSnapshot } from "@/lib/types";

export class AIRiskAssessor implements RiskAssessor {
  constructor(
    private readonly completer: ChatCompleter,
    private readonly thresholds: RiskThresholds
  ) {}

  async assess(weather: WeatherSnapshot): Promise<RiskAssessment> {
    const text = await this.completer.complete({
      messages: [
        { role: "system", content: "Reply with a single JSON object and nothing else." },
        { role: "user", content: riskPrompt(weather) },
      ],
      json: true,
    });
    return parseRiskReply(text, this.thresholds);
  }
}

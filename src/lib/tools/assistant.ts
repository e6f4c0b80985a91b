import { UpstreamUnavailableError } from "@/lib/errors";
import { AI_SERVICE, type ChatCompleter } from "@/lib/openai";
import type { Assistant, AssistantTurn } from "@/lib/types";

export class AIAssistant implements Assistant {
  constructor(private readonly completer: ChatCompleter) {}

  async reply(instructions: string, turns: AssistantTurn[]): Promise<string> {
    const text = await this.completer.complete({
      messages: [
        { role: "system", content: instructions },
        ...turns.map((t) =>
          t.role === "user" ? { role: "user" as const, content: t.content } : { role: "assistant" as const, content: t.content }
        ),
      ],
      temperature: 0.4,
    });
    const reply = text.trim();
    if (!reply) throw new UpstreamUnavailableError(AI_SERVICE, "empty reply");
    return reply;
  }
}

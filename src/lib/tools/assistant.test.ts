import { describe, expect, it, vi } from "vitest";
import { UpstreamUnavailableError } from "@/lib/errors";
import type { CompletionRequest } from "@/lib/openai";
import { AIAssistant } from "@/lib/tools/assistant";

describe("AIAssistant", () => {
  it("puts the instructions first and keeps turn order", async () => {
    const complete = vi.fn(async (_request: CompletionRequest) => "  Move to higher ground.  ");
    const assistant = new AIAssistant({ complete });

    const reply = await assistant.reply("You are an expert.", [
      { role: "user", content: "Is it flooding?" },
      { role: "assistant", content: "Possibly." },
      { role: "user", content: "What do I do?" },
    ]);

    expect(reply).toBe("Move to higher ground.");
    expect(complete.mock.calls[0][0].messages).toEqual([
      { role: "system", content: "You are an expert." },
      { role: "user", content: "Is it flooding?" },
      { role: "assistant", content: "Possibly." },
      { role: "user", content: "What do I do?" },
    ]);
  });

  it("treats an empty reply as an upstream failure", async () => {
    const assistant = new AIAssistant({ complete: async () => "   " });

    await expect(assistant.reply("x", [{ role: "user", content: "hi" }])).rejects.toBeInstanceOf(
      UpstreamUnavailableError
    );
  });
});

import OpenAI, { APIConnectionTimeoutError, APIError } from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { UpstreamUnavailableError, describeError } from "@/lib/errors";

export const AI_SERVICE = "AI service";

export type CompletionRequest = {
  messages: ChatCompletionMessageParam[];
  temperature?: number;
  /** Ask for a bare JSON object reply. */
  json?: boolean;
};

export interface ChatCompleter {
  /** Text of the first choice; "" when the model returned none. */
  complete(request: CompletionRequest): Promise<string>;
}

export function toUpstreamError(e: unknown) {
  if (e instanceof APIConnectionTimeoutError) {
    return new UpstreamUnavailableError(AI_SERVICE, "request timed out", { timedOut: true, cause: e });
  }
  if (e instanceof APIError && e.status === undefined) {
    return new UpstreamUnavailableError(AI_SERVICE, `connection failed: ${e.message}`, { cause: e });
  }
  return new UpstreamUnavailableError(AI_SERVICE, describeError(e), { cause: e });
}

export class OpenAIChat implements ChatCompleter {
  private readonly client: OpenAI;

  constructor(
    options: { apiKey: string; timeoutMs: number },
    private readonly model: string
  ) {
    // Single attempt per call; the caller decides what a failure means.
    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
  }

  async complete({ messages, temperature = 0.2, json = false }: CompletionRequest) {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature,
        response_format: json ? { type: "json_object" } : undefined,
      });
      return completion.choices[0]?.message?.content ?? "";
    } catch (e) {
      throw toUpstreamError(e);
    }
  }
}

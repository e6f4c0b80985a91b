import { randomUUID } from "node:crypto";
import { InvalidInputError, NotFoundError, StorageUnavailableError } from "@/lib/errors";
import type { AnalysisStore } from "@/lib/storage/analysisStore";
import type { Assistant, AssistantTurn, ChatEntry, ChatResult, ChatSession } from "@/lib/types";

export const MAX_MESSAGE_LENGTH = 4000;

export type ChatDeps = {
  assistant: Assistant;
  store: AnalysisStore;
  persona: string;
  historyLimit: number;
  now?: () => Date;
  newId?: () => string;
};

function toTurn(entry: ChatEntry): AssistantTurn {
  return { role: entry.role, content: entry.text };
}

export class ChatOrchestrator {
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly deps: ChatDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  private entry(role: ChatEntry["role"], text: string): ChatEntry {
    return { role, text, timestamp: this.now().toISOString() };
  }

  async chat(sessionId: string | undefined, message: string): Promise<ChatResult> {
    const text = message.trim();
    if (!text) throw new InvalidInputError("Empty message");
    if (text.length > MAX_MESSAGE_LENGTH) {
      throw new InvalidInputError(`Message is too long (max ${MAX_MESSAGE_LENGTH} characters)`);
    }

    const id = sessionId ?? this.newId();
    const session = await this.deps.store.getSession(id);
    const userEntry = this.entry("user", text);
    const context = this.deps.historyLimit > 0 ? session.messages.slice(-this.deps.historyLimit) : [];

    let reply: string;
    try {
      reply = await this.deps.assistant.reply(this.deps.persona, [...context.map(toTurn), toTurn(userEntry)]);
    } catch (e) {
      // Keep the user's input even though nobody answered it.
      await this.deps.store
        .appendToSession(id, userEntry)
        .catch((saveError: unknown) => console.warn(`[chat] session ${id} not persisted:`, saveError));
      throw e;
    }

    try {
      await this.deps.store.appendToSession(id, userEntry, this.entry("assistant", reply));
    } catch (e) {
      if (!(e instanceof StorageUnavailableError)) throw e;
      console.warn(`[chat] session ${id} not persisted: ${e.message}`);
    }

    return { reply, sessionId: id };
  }

  async transcript(sessionId: string): Promise<ChatSession> {
    const session = await this.deps.store.findSession(sessionId);
    if (!session) throw new NotFoundError("Chat not found");
    return session;
  }

  async forget(sessionId: string) {
    const deleted = await this.deps.store.deleteSession(sessionId);
    if (!deleted) throw new NotFoundError("Chat not found");
  }
}

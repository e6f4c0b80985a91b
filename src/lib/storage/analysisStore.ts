import { InvalidInputError, StorageUnavailableError, describeError } from "@/lib/errors";
import type { ObjectStore } from "@/lib/storage/objectStore";
import {
  AnalysisRecordSchema,
  ChatSessionSchema,
  type AnalysisRecord,
  type ChatEntry,
  type ChatSession,
} from "@/lib/types";

const REPORTS_PREFIX = "reports/";
const CHATS_PREFIX = "chats/";
const SAFE_ID = /^[A-Za-z0-9_-]{1,128}$/;

export function isSafeId(id: string) {
  return SAFE_ID.test(id);
}

function assertSessionId(id: string) {
  if (!isSafeId(id)) {
    throw new InvalidInputError("session_id may only contain letters, digits, '-' and '_' (max 128)");
  }
}

function emptySession(sessionId: string): ChatSession {
  return { session_id: sessionId, messages: [], updated_at: null };
}

/**
 * Persists analysis records and chat transcripts as one JSON object each.
 * Every backend failure surfaces as StorageUnavailableError.
 */
export class AnalysisStore {
  constructor(private readonly objects: ObjectStore) {}

  private async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw new StorageUnavailableError(`${action} failed: ${describeError(e)}`, { cause: e });
    }
  }

  private async readJson(key: string) {
    const raw = await this.guard(`read ${key}`, () => this.objects.get(key));
    if (raw === null) return null;
    try {
      const json: unknown = JSON.parse(raw);
      return json;
    } catch {
      console.warn(`[storage] ${key} is not valid JSON; ignoring`);
      return undefined;
    }
  }

  async save(record: AnalysisRecord) {
    const key = `${REPORTS_PREFIX}${record.id}.json`;
    await this.guard(`write ${key}`, () => this.objects.put(key, JSON.stringify(record, null, 2)));
    console.info(`[storage] stored ${key}`);
  }

  async get(id: string): Promise<AnalysisRecord | null> {
    if (!isSafeId(id)) return null;
    const json = await this.readJson(`${REPORTS_PREFIX}${id}.json`);
    const parsed = AnalysisRecordSchema.safeParse(json);
    return parsed.success ? parsed.data : null;
  }

  /** Every well-formed stored record, oldest first. */
  async list(): Promise<AnalysisRecord[]> {
    const keys = await this.guard("list reports", () => this.objects.list(REPORTS_PREFIX));
    const jsonKeys = keys.filter((key) => key.endsWith(".json"));
    const reads = await Promise.allSettled(jsonKeys.map((key) => this.readJson(key)));
    const records: AnalysisRecord[] = [];

    reads.forEach((read, i) => {
      const key = jsonKeys[i];
      if (read.status === "rejected") {
        console.warn(`[storage] skipping unreadable record ${key}: ${describeError(read.reason)}`);
        return;
      }
      const parsed = AnalysisRecordSchema.safeParse(read.value);
      if (parsed.success) records.push(parsed.data);
      else console.warn(`[storage] skipping malformed record ${key}`);
    });

    return records.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }

  async findSession(sessionId: string): Promise<ChatSession | null> {
    assertSessionId(sessionId);
    const key = `${CHATS_PREFIX}${sessionId}.json`;
    const json = await this.readJson(key);
    if (json === null) return null;

    const parsed = ChatSessionSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[storage] session ${key} is malformed; starting over`);
      return null;
    }
    return parsed.data;
  }

  async getSession(sessionId: string): Promise<ChatSession> {
    return (await this.findSession(sessionId)) ?? emptySession(sessionId);
  }

  /** Read-modify-write; concurrent appends to one session are last-writer-wins. */
  async appendToSession(sessionId: string, ...entries: ChatEntry[]): Promise<ChatSession> {
    const session = await this.getSession(sessionId);
    const updated: ChatSession = {
      ...session,
      messages: [...session.messages, ...entries],
      updated_at: entries.at(-1)?.timestamp ?? new Date().toISOString(),
    };

    const key = `${CHATS_PREFIX}${sessionId}.json`;
    await this.guard(`write ${key}`, () => this.objects.put(key, JSON.stringify(updated, null, 2)));
    return updated;
  }

  async deleteSession(sessionId: string) {
    assertSessionId(sessionId);
    const key = `${CHATS_PREFIX}${sessionId}.json`;
    return this.guard(`delete ${key}`, () => this.objects.delete(key));
  }
}

import { beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidInputError, StorageUnavailableError } from "@/lib/errors";
import { AnalysisStore } from "@/lib/storage/analysisStore";
import { MemoryObjectStore, type ObjectStore } from "@/lib/storage/objectStore";
import type { AnalysisRecord } from "@/lib/types";

function record(overrides: Partial<AnalysisRecord> = {}): AnalysisRecord {
  return {
    id: "rec-1",
    location_name: "Nagpur, Maharashtra, India",
    latitude: 20.5,
    longitude: 78.9,
    temperature: 32,
    humidity: 80,
    wind_speed: 5,
    rainfall: 50,
    risk_score: 72,
    risk_level: "High",
    recommendation: "Evacuate low-lying areas",
    timestamp: "2026-10-18T10:00:00.000Z",
    ...overrides,
  };
}

class BrokenObjectStore implements ObjectStore {
  async put(): Promise<void> {
    throw new Error("bucket offline");
  }
  async get(): Promise<string | null> {
    throw new Error("bucket offline");
  }
  async list(): Promise<string[]> {
    throw new Error("bucket offline");
  }
  async delete(): Promise<boolean> {
    throw new Error("bucket offline");
  }
}

describe("AnalysisStore", () => {
  let objects: MemoryObjectStore;
  let store: AnalysisStore;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    objects = new MemoryObjectStore();
    store = new AnalysisStore(objects);
  });

  it("writes each record as its own JSON object", async () => {
    await store.save(record());

    expect([...objects.objects.keys()]).toEqual(["reports/rec-1.json"]);
    expect(JSON.parse(objects.objects.get("reports/rec-1.json") ?? "null")).toEqual(record());
    await expect(store.get("rec-1")).resolves.toEqual(record());
  });

  it("lists records oldest first", async () => {
    await store.save(record({ id: "late", timestamp: "2026-10-18T12:00:00.000Z" }));
    await store.save(record({ id: "early", timestamp: "2026-10-18T08:00:00.000Z" }));

    const ids = (await store.list()).map((r) => r.id);
    expect(ids).toEqual(["early", "late"]);
  });

  it("skips objects that are not complete records", async () => {
    await store.save(record({ id: "good" }));
    await objects.put("reports/partial.json", JSON.stringify({ id: "partial", risk_level: "Unknown", risk_score: 0 }));
    await objects.put("reports/garbage.json", "{not json");
    await objects.put("reports/readme.txt", "ignore me");

    const ids = (await store.list()).map((r) => r.id);
    expect(ids).toEqual(["good"]);
  });

  it("skips records whose read fails and keeps the rest", async () => {
    await store.save(record({ id: "good" }));
    await store.save(record({ id: "flaky" }));
    const get = objects.get.bind(objects);
    vi.spyOn(objects, "get").mockImplementation(async (key) => {
      if (key === "reports/flaky.json") throw new Error("connection reset");
      return get(key);
    });

    const ids = (await store.list()).map((r) => r.id);

    expect(ids).toEqual(["good"]);
    expect(console.warn).toHaveBeenCalledWith(
      "[storage] skipping unreadable record reports/flaky.json: Storage: read reports/flaky.json failed: connection reset",
    );
  });

  it("returns null for unknown or unsafe ids", async () => {
    await expect(store.get("missing")).resolves.toBeNull();
    await expect(store.get("../chats/x")).resolves.toBeNull();
  });

  it("starts an empty session and accumulates appends", async () => {
    await expect(store.getSession("s1")).resolves.toEqual({ session_id: "s1", messages: [], updated_at: null });

    await store.appendToSession("s1", { role: "user", text: "hi", timestamp: "2026-10-18T10:00:00.000Z" });
    await store.appendToSession(
      "s1",
      { role: "user", text: "again", timestamp: "2026-10-18T10:01:00.000Z" },
      { role: "assistant", text: "hello", timestamp: "2026-10-18T10:01:05.000Z" }
    );

    const session = await store.getSession("s1");
    expect(session.messages.map((m) => m.text)).toEqual(["hi", "again", "hello"]);
    expect(session.updated_at).toBe("2026-10-18T10:01:05.000Z");
  });

  it("rejects session ids that could escape the chats/ prefix", async () => {
    await expect(store.getSession("../reports/rec-1")).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("deletes sessions and reports whether one existed", async () => {
    await store.appendToSession("s2", { role: "user", text: "hi", timestamp: "2026-10-18T10:00:00.000Z" });

    await expect(store.deleteSession("s2")).resolves.toBe(true);
    await expect(store.deleteSession("s2")).resolves.toBe(false);
    await expect(store.findSession("s2")).resolves.toBeNull();
  });

  it("wraps backend failures as StorageUnavailableError", async () => {
    const broken = new AnalysisStore(new BrokenObjectStore());

    await expect(broken.save(record())).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(broken.list()).rejects.toThrow("Storage: list reports failed: bucket offline");
    await expect(broken.getSession("s1")).rejects.toBeInstanceOf(StorageUnavailableError);
  });
});

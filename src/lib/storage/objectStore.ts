import { Storage, type Bucket } from "@google-cloud/storage";

/** Minimal object-storage surface: string bodies addressed by key. */
export interface ObjectStore {
  put(key: string, body: string, contentType?: string): Promise<void>;
  /** Resolves null when the key does not exist. */
  get(key: string): Promise<string | null>;
  list(prefix: string): Promise<string[]>;
  /** Resolves false when there was nothing to delete. */
  delete(key: string): Promise<boolean>;
}

function isNotFound(e: unknown) {
  return typeof e === "object" && e !== null && "code" in e && e.code === 404;
}

export class GcsObjectStore implements ObjectStore {
  private readonly bucket: Bucket;

  constructor(bucketName: string, projectId?: string | null) {
    this.bucket = new Storage(projectId ? { projectId } : {}).bucket(bucketName);
  }

  async put(key: string, body: string, contentType = "application/json") {
    await this.bucket.file(key).save(body, { contentType, resumable: false });
  }

  async get(key: string) {
    try {
      const [contents] = await this.bucket.file(key).download();
      return contents.toString("utf8");
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  async list(prefix: string) {
    const [files] = await this.bucket.getFiles({ prefix });
    return files.map((f) => f.name);
  }

  async delete(key: string) {
    try {
      await this.bucket.file(key).delete();
      return true;
    } catch (e) {
      if (isNotFound(e)) return false;
      throw e;
    }
  }
}

/** Process-local store, used when no bucket is configured and in tests. */
export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, string>();

  async put(key: string, body: string) {
    this.objects.set(key, body);
  }

  async get(key: string) {
    return this.objects.get(key) ?? null;
  }

  async list(prefix: string) {
    return [...this.objects.keys()].filter((k) => k.startsWith(prefix)).sort();
  }

  async delete(key: string) {
    return this.objects.delete(key);
  }
}

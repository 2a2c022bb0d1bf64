import { v4 as uuidv4 } from "uuid";

export type StoredDownload = { filename: string; data: Buffer; expiresAt: number };

// In-memory only; entries die with the process or after ttlMs, whichever comes first.
export class DownloadStore {
  private readonly entries = new Map<string, StoredDownload>();

  constructor(private readonly ttlMs: number, private readonly now: () => number = Date.now) {}

  put(filename: string, data: Buffer): { token: string; expiresAt: Date } {
    this.prune();
    const token = uuidv4();
    const expiresAt = this.now() + this.ttlMs;
    this.entries.set(token, { filename, data, expiresAt });
    return { token, expiresAt: new Date(expiresAt) };
  }

  /** Repeatable until the token expires. */
  get(token: string): StoredDownload | undefined {
    const entry = this.entries.get(token);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(token);
      return undefined;
    }
    return entry;
  }

  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(token);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

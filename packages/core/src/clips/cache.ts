import fs from "node:fs/promises";
import type { ClipArtifact } from "@lens/contracts";
import { errorMessage } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";

export type ClipCacheOptions = {
  maxEntries: number;
  maxBytes: number;
  maxAgeMs: number;
  now?: () => number;
  removeFile?: (filePath: string) => Promise<void>;
  logger?: Logger;
};

export type ClipLease = {
  artifact: ClipArtifact;
  release: () => void;
};

type Entry = { artifact: ClipArtifact; insertedAt: number };

async function unlinkIfPresent(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return;
    throw err;
  }
}

/**
 * In-memory index of extracted clips, LRU ordered and bounded by entry count,
 * total bytes and age. Evicting an entry removes its file unless a lease is
 * held, in which case removal waits for the last release.
 */
export class ClipCache {
  private readonly entries = new Map<string, Entry>();
  private readonly leases = new Map<string, number>();
  private readonly pendingRemoval = new Map<string, string>();
  private bytes = 0;
  private readonly now: () => number;
  private readonly removeFile: (filePath: string) => Promise<void>;
  private readonly log: Logger;

  constructor(private readonly opts: ClipCacheOptions) {
    if (!(opts.maxEntries > 0)) throw new Error("ClipCache maxEntries must be > 0");
    if (!(opts.maxBytes > 0)) throw new Error("ClipCache maxBytes must be > 0");
    if (!(opts.maxAgeMs > 0)) throw new Error("ClipCache maxAgeMs must be > 0");
    this.now = opts.now ?? Date.now;
    this.removeFile = opts.removeFile ?? unlinkIfPresent;
    this.log = (opts.logger ?? rootLogger).child({ component: "clip-cache" });
  }

  private expired(e: Entry): boolean {
    return this.now() - e.insertedAt > this.opts.maxAgeMs;
  }

  get(fingerprint: string): ClipArtifact | null {
    const e = this.entries.get(fingerprint);
    if (!e) return null;
    if (this.expired(e)) {
      this.evict(fingerprint, "expired");
      return null;
    }
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, e);
    return e.artifact;
  }

  put(artifact: ClipArtifact): void {
    const prev = this.entries.get(artifact.fingerprint);
    if (prev) {
      this.entries.delete(artifact.fingerprint);
      this.bytes -= prev.artifact.size_bytes;
      if (prev.artifact.file_path !== artifact.file_path) this.scheduleRemoval(artifact.fingerprint, prev.artifact.file_path);
    }
    // A re-extraction to the same path supersedes a removal still waiting on leases.
    if (this.pendingRemoval.get(artifact.fingerprint) === artifact.file_path) {
      this.pendingRemoval.delete(artifact.fingerprint);
    }

    this.entries.set(artifact.fingerprint, { artifact, insertedAt: this.now() });
    this.bytes += artifact.size_bytes;

    // The newest entry stays even when it alone exceeds the byte bound.
    while (this.entries.size > 1 && (this.entries.size > this.opts.maxEntries || this.bytes > this.opts.maxBytes)) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.evict(oldest.value, "capacity");
    }
  }

  /** Pin a cached clip's file until `release()`; null when not cached. */
  acquire(fingerprint: string): ClipLease | null {
    const artifact = this.get(fingerprint);
    if (!artifact) return null;
    this.leases.set(fingerprint, (this.leases.get(fingerprint) ?? 0) + 1);

    let released = false;
    return {
      artifact,
      release: () => {
        if (released) return;
        released = true;
        const left = (this.leases.get(fingerprint) ?? 1) - 1;
        if (left > 0) {
          this.leases.set(fingerprint, left);
          return;
        }
        this.leases.delete(fingerprint);
        const pending = this.pendingRemoval.get(fingerprint);
        if (pending !== undefined) {
          this.pendingRemoval.delete(fingerprint);
          this.unlink(pending);
        }
      },
    };
  }

  evictExpired(): number {
    let removed = 0;
    for (const [fp, e] of [...this.entries]) {
      if (!this.expired(e)) continue;
      this.evict(fp, "expired");
      removed++;
    }
    return removed;
  }

  /**
   * Empty the index. Files go with their entries unless `keepFiles` is set;
   * a leased file is removed on its last release as with eviction.
   */
  clear(opts?: { keepFiles?: boolean }): number {
    const fingerprints = [...this.entries.keys()];
    for (const fp of fingerprints) {
      if (opts?.keepFiles) {
        this.entries.delete(fp);
        continue;
      }
      this.evict(fp, "cleared");
    }
    this.bytes = 0;
    return fingerprints.length;
  }

  has(fingerprint: string): boolean {
    return this.entries.has(fingerprint);
  }

  stats(): { entries: number; bytes: number; leased: number; pending_removal: number } {
    return {
      entries: this.entries.size,
      bytes: this.bytes,
      leased: this.leases.size,
      pending_removal: this.pendingRemoval.size,
    };
  }

  private evict(fingerprint: string, reason: "expired" | "capacity" | "cleared"): void {
    const e = this.entries.get(fingerprint);
    if (!e) return;
    this.entries.delete(fingerprint);
    this.bytes -= e.artifact.size_bytes;
    this.log.debug({ fingerprint, reason, size_bytes: e.artifact.size_bytes }, "Clip evicted");
    this.scheduleRemoval(fingerprint, e.artifact.file_path);
  }

  private scheduleRemoval(fingerprint: string, filePath: string): void {
    if ((this.leases.get(fingerprint) ?? 0) > 0) {
      this.pendingRemoval.set(fingerprint, filePath);
      return;
    }
    this.unlink(filePath);
  }

  private unlink(filePath: string): void {
    this.removeFile(filePath).catch((err: unknown) => {
      this.log.warn({ file_path: filePath, err: errorMessage(err) }, "Failed to remove evicted clip");
    });
  }
}

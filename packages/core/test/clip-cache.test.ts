import test from "node:test";
import assert from "node:assert/strict";
import type { ClipArtifact } from "@lens/contracts";
import { ClipCache } from "../src/clips/cache";
import { clipFingerprint, snapRange } from "../src/clips/fingerprint";
import { createSilentLogger } from "../src/logger";

function artifact(fp: string, sizeBytes = 10): ClipArtifact {
  return {
    fingerprint: fp,
    video_id: "v1",
    start_ms: 0,
    end_ms: 5000,
    file_path: `/clips/${fp}.mp4`,
    size_bytes: sizeBytes,
    created_at: "2026-01-01T00:00:00.000Z",
  };
}

function makeCache(opts: { maxEntries?: number; maxBytes?: number; maxAgeMs?: number } = {}) {
  const clock = { t: 0 };
  const removed: string[] = [];
  const cache = new ClipCache({
    maxEntries: opts.maxEntries ?? 10,
    maxBytes: opts.maxBytes ?? 1000,
    maxAgeMs: opts.maxAgeMs ?? 60_000,
    now: () => clock.t,
    removeFile: async (p) => {
      removed.push(p);
    },
    logger: createSilentLogger(),
  });
  return { cache, clock, removed };
}

test("snapRange rounds to the nearest step", () => {
  assert.deepEqual(snapRange(10_000, 15_000, 500), { start_ms: 10_000, end_ms: 15_000 });
  assert.deepEqual(snapRange(10_200, 15_100, 500), { start_ms: 10_000, end_ms: 15_000 });
  assert.deepEqual(snapRange(10_300, 15_300, 500), { start_ms: 10_500, end_ms: 15_500 });
  assert.deepEqual(snapRange(1000, 1100, 500), { start_ms: 1000, end_ms: 1500 });
  assert.deepEqual(snapRange(1000.4, 2000.6, 0), { start_ms: 1000, end_ms: 2001 });
});

test("fingerprints depend on video and range only", () => {
  assert.equal(clipFingerprint("v1", 10_000, 15_000), clipFingerprint("v1", 10_000, 15_000));
  assert.notEqual(clipFingerprint("v1", 10_000, 15_000), clipFingerprint("v2", 10_000, 15_000));
  assert.notEqual(clipFingerprint("v1", 10_000, 15_000), clipFingerprint("v1", 10_000, 15_500));
  assert.match(clipFingerprint("v1", 0, 1), /^[0-9a-f]{64}$/);
});

test("get returns what put stored and stats track size", () => {
  const { cache } = makeCache();
  cache.put(artifact("a", 30));
  cache.put(artifact("b", 20));
  assert.equal(cache.get("a")?.file_path, "/clips/a.mp4");
  assert.equal(cache.get("zzz"), null);
  assert.deepEqual(cache.stats(), { entries: 2, bytes: 50, leased: 0, pending_removal: 0 });
});

test("the least recently used entry goes first and its file is removed", () => {
  const { cache, removed } = makeCache({ maxEntries: 2 });
  cache.put(artifact("a"));
  cache.put(artifact("b"));
  cache.get("a");
  cache.put(artifact("c"));

  assert.equal(cache.has("b"), false);
  assert.equal(cache.has("a"), true);
  assert.deepEqual(removed, ["/clips/b.mp4"]);
});

test("the byte bound evicts older entries but keeps the newest", () => {
  const { cache, removed } = makeCache({ maxBytes: 100 });
  cache.put(artifact("a", 60));
  cache.put(artifact("b", 50));
  assert.deepEqual(removed, ["/clips/a.mp4"]);

  cache.put(artifact("huge", 150));
  assert.deepEqual(removed, ["/clips/a.mp4", "/clips/b.mp4"]);
  assert.deepEqual(cache.stats(), { entries: 1, bytes: 150, leased: 0, pending_removal: 0 });
});

test("entries older than the age bound expire", () => {
  const { cache, clock, removed } = makeCache({ maxAgeMs: 1000 });
  cache.put(artifact("a"));
  clock.t = 500;
  cache.put(artifact("b"));

  clock.t = 1200;
  assert.equal(cache.get("a"), null);
  assert.notEqual(cache.get("b"), null);

  clock.t = 1600;
  assert.equal(cache.evictExpired(), 1);
  assert.deepEqual(removed, ["/clips/a.mp4", "/clips/b.mp4"]);
});

test("a leased clip keeps its file until the last release", () => {
  const { cache, removed } = makeCache({ maxEntries: 1 });
  cache.put(artifact("a"));
  const first = cache.acquire("a");
  const second = cache.acquire("a");
  assert.equal(first?.artifact.fingerprint, "a");

  cache.put(artifact("b"));
  assert.equal(cache.has("a"), false);
  assert.deepEqual(removed, []);
  assert.deepEqual(cache.stats(), { entries: 1, bytes: 10, leased: 1, pending_removal: 1 });

  first?.release();
  first?.release();
  assert.deepEqual(removed, []);
  second?.release();
  assert.deepEqual(removed, ["/clips/a.mp4"]);
  assert.equal(cache.stats().pending_removal, 0);
});

test("re-publishing a clip cancels the removal still waiting on its lease", () => {
  const { cache, removed } = makeCache({ maxEntries: 1 });
  cache.put(artifact("a"));
  const lease = cache.acquire("a");
  cache.put(artifact("b"));
  cache.put(artifact("a"));

  lease?.release();
  assert.deepEqual(removed, ["/clips/b.mp4"]);
  assert.equal(cache.has("a"), true);
});

test("acquire on a missing clip is null", () => {
  const { cache } = makeCache();
  assert.equal(cache.acquire("nope"), null);
});

test("clear removes every file except leased ones, which go on release", () => {
  const { cache, removed } = makeCache();
  cache.put(artifact("a", 30));
  cache.put(artifact("b", 20));
  const lease = cache.acquire("a");

  assert.equal(cache.clear(), 2);
  assert.deepEqual(removed, ["/clips/b.mp4"]);
  assert.deepEqual(cache.stats(), { entries: 0, bytes: 0, leased: 1, pending_removal: 1 });
  assert.equal(lease?.artifact.file_path, "/clips/a.mp4");

  lease?.release();
  assert.deepEqual(removed, ["/clips/b.mp4", "/clips/a.mp4"]);
});

test("clear can keep the files on disk", () => {
  const { cache, removed } = makeCache();
  cache.put(artifact("a"));
  cache.put(artifact("b"));
  assert.equal(cache.clear({ keepFiles: true }), 2);
  assert.deepEqual(removed, []);
  assert.deepEqual(cache.stats(), { entries: 0, bytes: 0, leased: 0, pending_removal: 0 });
});

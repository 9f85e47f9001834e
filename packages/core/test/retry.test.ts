import test from "node:test";
import assert from "node:assert/strict";
import { abortError } from "../src/util/abort";
import { computeDelay, isTransientError, withRetry } from "../src/util/retry";

test("transient errors are rate limits, 5xx, network failures and timeouts", () => {
  assert.equal(isTransientError(new Error("Ollama embeddings failed: 429 Too Many Requests")), true);
  assert.equal(isTransientError(new Error("OpenAI embeddings failed: 503 ")), true);
  assert.equal(isTransientError(new Error("fetch failed")), true);
  assert.equal(isTransientError(new Error("Ollama embeddings timed out after 100ms")), true);
  assert.equal(isTransientError(new Error("OpenAI embeddings failed: 400 bad input")), false);
  assert.equal(isTransientError(abortError()), false);
  assert.equal(isTransientError("503"), false);
});

test("computeDelay doubles up to the cap", () => {
  const opts = { initialDelayMs: 500, maxDelayMs: 8000, multiplier: 2, jitter: 0.25 };
  const mid = () => 0.5;
  assert.equal(computeDelay(0, opts, mid), 500);
  assert.equal(computeDelay(1, opts, mid), 1000);
  assert.equal(computeDelay(10, opts, mid), 8000);
  assert.equal(computeDelay(0, opts, () => 1), 625);
  assert.equal(computeDelay(0, opts, () => 0), 375);
});

test("withRetry retries transient failures with backoff", async () => {
  const sleeps: number[] = [];
  const retries: number[] = [];
  let calls = 0;
  const out = await withRetry(
    async (attempt) => {
      calls++;
      if (attempt < 2) throw new Error("upstream failed: 503");
      return "ok";
    },
    {
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      random: () => 0.5,
      onRetry: (attempt) => retries.push(attempt),
    }
  );
  assert.equal(out, "ok");
  assert.equal(calls, 3);
  assert.deepEqual(sleeps, [500, 1000]);
  assert.deepEqual(retries, [1, 2]);
});

test("withRetry gives up after maxRetries and throws the last error", async () => {
  let calls = 0;
  await assert.rejects(
    () =>
      withRetry(
        async () => {
          calls++;
          throw new Error(`upstream failed: 502 try ${calls}`);
        },
        { maxRetries: 2, sleep: async () => undefined }
      ),
    /502 try 3/
  );
  assert.equal(calls, 3);
});

test("withRetry throws non-transient errors straight away", async () => {
  let calls = 0;
  await assert.rejects(
    () =>
      withRetry(
        async () => {
          calls++;
          throw new Error("bad request: 400");
        },
        { sleep: async () => undefined }
      ),
    /bad request/
  );
  assert.equal(calls, 1);
});

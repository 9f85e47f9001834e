import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parseShowInfo, parseShowInfoLine, sampleFrames } from "../src/frames/sample";
import type { ExecFn } from "../src/media/ffmpeg";

const SHOWINFO = [
  "Input #0, mov,mp4,m4a,3gp,3g2,mj2, from 'lecture.mp4':",
  "[Parsed_showinfo_1 @ 0x55d0c] n:   1 pts:  80080 pts_time:5.005   duration:1001",
  "[Parsed_showinfo_1 @ 0x55d0c] n:   0 pts:      0 pts_time:0       duration:1001",
  "frame=    2 fps=0.0 q=4.0 Lsize=N/A time=00:00:10.01",
].join("\n");

test("parseShowInfoLine reads frame number and pts_time", () => {
  assert.deepEqual(parseShowInfoLine("[Parsed_showinfo_1 @ 0x1] n:  12 pts: 1 pts_time:61.25 duration:1"), {
    n: 12,
    timestampMs: 61_250,
  });
  assert.equal(parseShowInfoLine("frame=    2 fps=0.0"), null);
});

test("parseShowInfo returns frames ordered by number", () => {
  assert.deepEqual(parseShowInfo(SHOWINFO), [
    { n: 0, timestampMs: 0 },
    { n: 1, timestampMs: 5005 },
  ]);
});

test("sampleFrames pairs written files with showinfo timestamps", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "lens-frames-"));
  const calls: string[][] = [];
  const exec: ExecFn = async (_file, args) => {
    calls.push(args);
    const outDir = path.dirname(args[args.length - 1]);
    for (const name of ["frame_000001.jpg", "frame_000002.jpg", "frame_000003.jpg"]) {
      await fs.writeFile(path.join(outDir, name), "jpg");
    }
    return { stdout: "", stderr: SHOWINFO };
  };

  try {
    const frames = await sampleFrames("v1", "/videos/v1.mp4", dir, { intervalMs: 5000, exec });
    assert.deepEqual(frames, [
      { video_id: "v1", timestamp_ms: 0, image_ref: path.join(dir, "frame_000001.jpg") },
      { video_id: "v1", timestamp_ms: 5005, image_ref: path.join(dir, "frame_000002.jpg") },
      { video_id: "v1", timestamp_ms: 10_000, image_ref: path.join(dir, "frame_000003.jpg") },
    ]);
    assert.equal(calls.length, 1);
    assert.ok(calls[0].includes("fps=1/5,showinfo,scale=640:-2,format=yuvj420p"));
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

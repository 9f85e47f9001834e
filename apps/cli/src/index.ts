#!/usr/bin/env node
import path from "node:path";
import { Command } from "commander";
import type { FrameSample, VideoAsset } from "@lens/contracts";
import {
  FfmpegMediaStore,
  FileSubtitleSource,
  MemoryVectorIndex,
  PgVectorIndex,
  closePool,
  createEmbedderFromEnv,
  createGeneratorFromEnv,
  createLensRuntime,
  defaultMigrationsDir,
  getEmbeddingsStatus,
  getGenerationStatus,
  getLensDefault,
  getPool,
  ingestVideos,
  initMetrics,
  loadEngineConfig,
  logger,
  migrateDb,
  sampleFrames,
  toErrorEnvelope,
  upsertVideo,
  type EngineConfig,
  type IngestItem,
  type LensRuntime,
  type VectorIndex,
} from "@lens/core";
import { parseCsvList, printTable, renderQueryResult } from "./format";
import { askOptions } from "./options";

function handleErr(err: unknown): never {
  const envelope = toErrorEnvelope(err);
  console.error(`error: ${envelope.error.code}: ${envelope.error.message}`);
  process.exit(1);
}

type Dirs = { videosDir: string; subtitlesDir: string; framesDir: string; clipsDir: string };

function resolveDirs(cmd: { videosDir?: string; subtitlesDir?: string }): Dirs {
  return {
    videosDir: path.resolve(cmd.videosDir || getLensDefault("LENS_VIDEOS_DIR")),
    subtitlesDir: path.resolve(cmd.subtitlesDir || getLensDefault("LENS_SUBTITLES_DIR")),
    framesDir: path.resolve(getLensDefault("LENS_FRAMES_DIR")),
    clipsDir: path.resolve(getLensDefault("LENS_CLIPS_DIR")),
  };
}

function buildRuntime(config: EngineConfig, index: VectorIndex, media: FfmpegMediaStore, dirs: Dirs): LensRuntime {
  return createLensRuntime(config, {
    embedder: createEmbedderFromEnv(),
    generator: createGeneratorFromEnv(),
    index,
    media,
    clipsDir: dirs.clipsDir,
    logger,
  });
}

async function prepareItems(
  videoIds: string[],
  media: FfmpegMediaStore,
  config: EngineConfig,
  dirs: Dirs,
  withFrames: boolean
): Promise<IngestItem[]> {
  const items: IngestItem[] = [];
  for (const id of videoIds) {
    const handle = await media.open(id);
    let frames: FrameSample[] = [];
    if (withFrames) {
      frames = await sampleFrames(id, handle.path, path.join(dirs.framesDir, id), { intervalMs: config.frameIntervalMs });
    }
    const video: VideoAsset = {
      id,
      source_uri: handle.path,
      duration_ms: handle.duration_ms,
      frame_interval_ms: config.frameIntervalMs,
      title: null,
    };
    items.push({ video, frames });
  }
  return items;
}

const program = new Command();
program
  .name("lens")
  .description("Ask questions of indexed lecture videos and get cited answers with clips")
  .option("--json", "Machine-friendly JSON output", false);

program
  .command("migrate")
  .description("Apply database migrations")
  .action(async () => {
    try {
      const pool = getPool();
      const client = await pool.connect();
      try {
        const res = await migrateDb({ client, migrationsDir: defaultMigrationsDir() });
        console.log(JSON.stringify({ ok: true, applied: res.applied }, null, 2));
      } finally {
        client.release();
        await closePool();
      }
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("ingest")
  .description("Segment and index videos from <videos-dir>/<id>.<ext> and <subtitles-dir>/<id>.vtt|.srt")
  .argument("<video-ids...>", "Video ids")
  .option("--videos-dir <dir>", "Directory holding source videos")
  .option("--subtitles-dir <dir>", "Directory holding subtitle files")
  .option("--frames", "Sample frames and attach the nearest one to each chunk", false)
  .action(async (videoIds: string[], cmd: { videosDir?: string; subtitlesDir?: string; frames: boolean }) => {
    try {
      const opts = program.opts<{ json: boolean }>();
      const config = loadEngineConfig();
      const dirs = resolveDirs(cmd);
      const media = new FfmpegMediaStore(dirs.videosDir);
      const pool = getPool();
      try {
        const runtime = buildRuntime(config, new PgVectorIndex(pool), media, dirs);
        const items = await prepareItems(videoIds, media, config, dirs, cmd.frames);

        const client = await pool.connect();
        try {
          for (const item of items) await upsertVideo(client, item.video);
        } finally {
          client.release();
        }

        const report = await ingestVideos(items, {
          subtitles: new FileSubtitleSource(dirs.subtitlesDir),
          indexer: runtime.indexer,
          segment: config,
          logger,
        });
        if (opts.json) return void console.log(JSON.stringify(report, null, 2));

        printTable(
          report.ingested.map((r) => ({
            video_id: r.video_id,
            cues: r.cues,
            chunks: r.chunks,
            written: r.written,
            failed: r.failed.length,
          }))
        );
        for (const r of report.rejected) console.error(`warn: ${r.video_id} rejected: ${r.error}`);
        if (report.rejected.length || report.ingested.some((r) => r.failed.length)) process.exitCode = 2;
      } finally {
        await closePool();
      }
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("ask")
  .description("Answer a question from the indexed lectures")
  .argument("<query...>", "Question")
  .option("--top-k <n>", "Results to return", "5")
  .option("--min-score <x>", "Minimum similarity (0-1)", "0.3")
  .option("--no-clip", "Skip clip extraction")
  .option("--memory <csv>", "Index these video ids in memory first instead of using Postgres")
  .option("--videos-dir <dir>", "Directory holding source videos")
  .option("--subtitles-dir <dir>", "Directory holding subtitle files")
  .option("--metrics", "Print Prometheus metrics after the answer", false)
  .action(
    async (
      queryParts: string[],
      cmd: {
        topK: string;
        minScore: string;
        clip: boolean;
        memory?: string;
        videosDir?: string;
        subtitlesDir?: string;
        metrics: boolean;
      }
    ) => {
      const ac = new AbortController();
      const onSigint = () => ac.abort();
      process.once("SIGINT", onSigint);
      try {
        const opts = program.opts<{ json: boolean }>();
        const config = loadEngineConfig();
        const dirs = resolveDirs(cmd);
        const media = new FfmpegMediaStore(dirs.videosDir);
        const memoryIds = parseCsvList(cmd.memory);
        const usePg = memoryIds.length === 0;
        const index: VectorIndex = usePg ? new PgVectorIndex(getPool()) : new MemoryVectorIndex();
        const runtime = buildRuntime(config, index, media, dirs);

        try {
          if (!usePg) {
            const items = await prepareItems(memoryIds, media, config, dirs, false);
            await ingestVideos(items, {
              subtitles: new FileSubtitleSource(dirs.subtitlesDir),
              indexer: runtime.indexer,
              segment: config,
              logger,
            });
          }

          const result = await runtime.engine.answer(queryParts.join(" "), askOptions(cmd), { signal: ac.signal });

          try {
            if (opts.json) console.log(JSON.stringify(result, null, 2));
            else for (const line of renderQueryResult(result)) console.log(line);
          } finally {
            result.release();
          }

          if (cmd.metrics) console.log(await initMetrics().register.metrics());
        } finally {
          // The printed clip path is this command's output; leave the file in place.
          runtime.shutdown({ keepClipFiles: true });
          if (usePg) await closePool();
        }
      } catch (err) {
        handleErr(err);
      } finally {
        process.off("SIGINT", onSigint);
      }
    }
  );

program
  .command("health")
  .description("Show embedding and generation provider status")
  .action(() => {
    const opts = program.opts<{ json: boolean }>();
    const embeddings = getEmbeddingsStatus();
    const generation = getGenerationStatus();
    if (opts.json) return void console.log(JSON.stringify({ embeddings, generation }, null, 2));
    printTable(
      [
        { feature: "embeddings", status: embeddings },
        { feature: "generation", status: generation },
      ].map(({ feature, status }) => ({
        feature,
        enabled: status.enabled ? "yes" : "no",
        details: status.enabled ? `${status.provider ?? "unknown"} ${status.model_id ?? ""}`.trim() : status.reason ?? "disabled",
      }))
    );
  });

program.parseAsync(process.argv).catch(handleErr);

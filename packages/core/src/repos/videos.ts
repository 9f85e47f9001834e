import { VideoAssetSchema, type VideoAsset } from "@lens/contracts";
import type { PgClientLike } from "../db/pool";

export async function upsertVideo(client: PgClientLike, video: VideoAsset): Promise<void> {
  await client.query(
    `
    INSERT INTO videos (id, source_uri, duration_ms, frame_interval_ms, title)
    VALUES ($1, $2, $3, $4, $5)
    ON CONFLICT (id) DO UPDATE SET
      source_uri = EXCLUDED.source_uri,
      duration_ms = EXCLUDED.duration_ms,
      frame_interval_ms = EXCLUDED.frame_interval_ms,
      title = EXCLUDED.title
    `,
    [video.id, video.source_uri, video.duration_ms, video.frame_interval_ms, video.title]
  );
}

export async function getVideoById(client: PgClientLike, videoId: string): Promise<VideoAsset | null> {
  const res = await client.query(
    `SELECT id, source_uri, duration_ms, frame_interval_ms, title FROM videos WHERE id = $1`,
    [videoId]
  );
  const row = res.rows[0];
  return row ? VideoAssetSchema.parse(row) : null;
}

/** Removing the source video drops its chunks and, by cascade, their vectors. */
export async function deleteVideo(client: PgClientLike, videoId: string): Promise<boolean> {
  await client.query(`DELETE FROM transcript_chunks WHERE video_id = $1`, [videoId]);
  const res = await client.query(`DELETE FROM videos WHERE id = $1`, [videoId]);
  return (res.rowCount ?? 0) > 0;
}

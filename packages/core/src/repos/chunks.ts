import { TranscriptChunkSchema, type TranscriptChunk } from "@lens/contracts";
import type { PgClientLike } from "../db/pool";

export const CHUNK_COLUMNS = `
  ch.id,
  ch.video_id,
  ch.idx,
  ch.start_ms,
  ch.end_ms,
  ch.text,
  ch.cue_start_idx,
  ch.cue_end_idx,
  ch.frame_timestamp_ms,
  ch.frame_image_ref,
  ch.token_estimate
`;

export function chunkFromRow(row: Record<string, unknown>): TranscriptChunk {
  const frameTs = row.frame_timestamp_ms;
  const frameRef = row.frame_image_ref;
  return TranscriptChunkSchema.parse({
    id: row.id,
    video_id: row.video_id,
    idx: row.idx,
    start_ms: row.start_ms,
    end_ms: row.end_ms,
    text: row.text,
    cue_start_idx: row.cue_start_idx,
    cue_end_idx: row.cue_end_idx,
    frame:
      frameTs != null && typeof frameRef === "string"
        ? { video_id: row.video_id, timestamp_ms: frameTs, image_ref: frameRef }
        : null,
    token_estimate: row.token_estimate,
  });
}

export async function upsertChunk(client: PgClientLike, chunk: TranscriptChunk): Promise<void> {
  await client.query(
    `
    INSERT INTO transcript_chunks
      (id, video_id, idx, start_ms, end_ms, text, cue_start_idx, cue_end_idx, frame_timestamp_ms, frame_image_ref, token_estimate)
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
    ON CONFLICT (id) DO UPDATE SET
      idx = EXCLUDED.idx,
      text = EXCLUDED.text,
      cue_start_idx = EXCLUDED.cue_start_idx,
      cue_end_idx = EXCLUDED.cue_end_idx,
      frame_timestamp_ms = EXCLUDED.frame_timestamp_ms,
      frame_image_ref = EXCLUDED.frame_image_ref,
      token_estimate = EXCLUDED.token_estimate
    `,
    [
      chunk.id,
      chunk.video_id,
      chunk.idx,
      chunk.start_ms,
      chunk.end_ms,
      chunk.text,
      chunk.cue_start_idx,
      chunk.cue_end_idx,
      chunk.frame?.timestamp_ms ?? null,
      chunk.frame?.image_ref ?? null,
      chunk.token_estimate,
    ]
  );
}

export async function listChunksForVideo(client: PgClientLike, videoId: string): Promise<TranscriptChunk[]> {
  const res = await client.query(
    `SELECT ${CHUNK_COLUMNS} FROM transcript_chunks ch WHERE ch.video_id = $1 ORDER BY ch.start_ms ASC`,
    [videoId]
  );
  return res.rows.map((r) => chunkFromRow(r));
}

export async function deleteChunksForVideo(client: PgClientLike, videoId: string): Promise<number> {
  const res = await client.query(`DELETE FROM transcript_chunks WHERE video_id = $1`, [videoId]);
  return res.rowCount ?? 0;
}

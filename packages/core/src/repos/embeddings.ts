import type { EmbeddingVector } from "@lens/contracts";
import type { PgClientLike } from "../db/pool";

export function toPgVector(v: readonly number[]): string {
  // pgvector accepts a string literal in the form: '[1,2,3]'.
  return `[${v.join(",")}]`;
}

/**
 * Write the chunk's vector. The table holds one row per chunk, so a vector from
 * a newer model replaces the old one instead of sitting beside it.
 */
export async function upsertEmbedding(client: PgClientLike, input: EmbeddingVector): Promise<void> {
  await client.query(
    `
    INSERT INTO chunk_embeddings (chunk_id, model_id, dimensions, embedding, text_hash, updated_at)
    VALUES ($1, $2, $3, $4::vector, $5, now())
    ON CONFLICT (chunk_id) DO UPDATE SET
      model_id = EXCLUDED.model_id,
      dimensions = EXCLUDED.dimensions,
      embedding = EXCLUDED.embedding,
      text_hash = EXCLUDED.text_hash,
      updated_at = now()
    `,
    [input.chunk_id, input.model_id, input.dimensions, toPgVector(input.vector), input.text_hash]
  );
}

export async function countEmbeddingsForVideo(client: PgClientLike, videoId: string, modelId: string): Promise<number> {
  const res = await client.query(
    `
    SELECT count(*)::text AS n
    FROM chunk_embeddings e
    JOIN transcript_chunks ch ON ch.id = e.chunk_id
    WHERE ch.video_id = $1 AND e.model_id = $2
    `,
    [videoId, modelId]
  );
  return Number(res.rows[0]?.n ?? 0);
}

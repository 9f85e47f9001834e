import { withTransaction, type PgPoolLike } from "../db/pool";
import { CHUNK_COLUMNS, chunkFromRow, deleteChunksForVideo, upsertChunk } from "../repos/chunks";
import { toPgVector, upsertEmbedding } from "../repos/embeddings";
import { throwIfAborted } from "../util/abort";
import { clampScore, type VectorCandidate, type VectorEntry, type VectorIndex } from "./types";

/** pgvector-backed index; score is `1 - cosine distance`. */
export class PgVectorIndex implements VectorIndex {
  constructor(private readonly pool: PgPoolLike) {}

  async upsert(entry: VectorEntry): Promise<void> {
    if (entry.embedding.chunk_id !== entry.chunk.id) {
      throw new Error(`embedding for ${entry.embedding.chunk_id} paired with chunk ${entry.chunk.id}`);
    }
    await withTransaction(this.pool, async (client) => {
      await upsertChunk(client, entry.chunk);
      await upsertEmbedding(client, entry.embedding);
    });
  }

  async search(vector: number[], k: number, opts: { model_id: string; signal?: AbortSignal }): Promise<VectorCandidate[]> {
    throwIfAborted(opts.signal);
    const client = await this.pool.connect();
    try {
      throwIfAborted(opts.signal);
      const res = await client.query(
        `
        SELECT
          ${CHUNK_COLUMNS},
          (1 - (e.embedding <=> $1::vector)) AS score
        FROM chunk_embeddings e
        JOIN transcript_chunks ch ON ch.id = e.chunk_id
        WHERE e.model_id = $2
        ORDER BY e.embedding <=> $1::vector
        LIMIT $3
        `,
        [toPgVector(vector), opts.model_id, Math.max(1, Math.floor(k))]
      );
      return res.rows.map((r) => ({ chunk: chunkFromRow(r), score: clampScore(Number(r.score)) }));
    } finally {
      client.release();
    }
  }

  async removeVideo(videoId: string): Promise<number> {
    return withTransaction(this.pool, (client) => deleteChunksForVideo(client, videoId));
  }
}

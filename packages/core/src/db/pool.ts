import pg from "pg";
import { z } from "zod";
import { getLensDefault } from "../config/defaults";

const { Pool } = pg;

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
});

/** The slice of pg.PoolClient the repos use; tests pass an in-process fake. */
export type PgClientLike = {
  query: (text: string, values?: unknown[]) => Promise<{ rows: Array<Record<string, unknown>>; rowCount: number | null }>;
  release: () => void;
};

export type PgPoolLike = {
  connect: () => Promise<PgClientLike>;
};

let _pool: pg.Pool | null = null;

export function getPool(env: Record<string, string | undefined> = process.env): pg.Pool {
  if (_pool) return _pool;
  const parsed = EnvSchema.parse(env);
  const connectionString = parsed.DATABASE_URL ?? getLensDefault("DATABASE_URL", env);
  _pool = new Pool({ connectionString });
  return _pool;
}

export async function closePool(): Promise<void> {
  if (!_pool) return;
  const p = _pool;
  _pool = null;
  await p.end();
}

export async function withTransaction<T>(pool: PgPoolLike, fn: (client: PgClientLike) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    try {
      const out = await fn(client);
      await client.query("COMMIT");
      return out;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    }
  } finally {
    client.release();
  }
}

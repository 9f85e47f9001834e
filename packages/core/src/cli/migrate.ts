import { closePool, getPool } from "../db/pool";
import { defaultMigrationsDir, migrateDb } from "../db/migrate";
import { errorMessage } from "../errors";

async function main() {
  const pool = getPool();
  const client = await pool.connect();
  try {
    const res = await migrateDb({ client, migrationsDir: defaultMigrationsDir() });
    // Keep CLI output stable and simple for scripting.
    console.log(JSON.stringify({ ok: true, applied: res.applied }, null, 2));
  } finally {
    client.release();
    await closePool();
  }
}

main().catch((err: unknown) => {
  console.error(JSON.stringify({ ok: false, error: errorMessage(err) }, null, 2));
  process.exit(1);
});

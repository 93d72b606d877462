import { runMigrations } from "../db/migrations";
import { createPool } from "../db/pool";

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required to run migrations");
  }

  const pool = createPool(databaseUrl);

  try {
    const applied = await runMigrations(pool);
    console.log(`migrations applied: ${applied}`);
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error("migration failed", error);
  process.exit(1);
});

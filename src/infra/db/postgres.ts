import pg from "pg";

export function createPostgresPool(databaseUrl: string): pg.Pool {
  const pool = new pg.Pool({ connectionString: databaseUrl, max: 10 });
  pool.on("error", (error) => {
    console.error("[postgres] idle client error:", error.message);
  });
  return pool;
}

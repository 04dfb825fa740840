import pg from "pg";
import { loadConfig } from "../config.js";

const { databaseUrl } = loadConfig();

const pool = new pg.Pool({
  connectionString: databaseUrl,
  ssl: databaseUrl.includes("localhost")
    ? false
    : { rejectUnauthorized: true },
  max: 10,
});

// Idle clients emit here when the server drops them.
pool.on("error", (err) => {
  console.error("[db] Unexpected error on idle client:", err.message);
});

export default pool;

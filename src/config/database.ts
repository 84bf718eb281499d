import postgres from "postgres";
import { loadEnv } from "./config";

type Env = Record<string, string | undefined>;

// PostgreSQL client from the standard PG* environment variables
export function createSql(env: Env = loadEnv()) {
  return postgres({
    host: env.PGHOST || "localhost",
    port: parseInt(env.PGPORT || "5432"),
    database: env.PGDATABASE || "pool_engine_dev",
    username: env.PGUSER || "postgres",
    password: env.PGPASSWORD || "",
    ssl: env.PGSSL === "true" ? "require" : false,
    max: parseInt(env.PGMAXCONNECTIONS || "10"), // connection pool size
    idle_timeout: parseInt(env.PGIDLE_TIMEOUT || "20"),
    connect_timeout: parseInt(env.PGCONNECT_TIMEOUT || "30"),
    onnotice: () => {}, // Suppress notices
  });
}

export type Sql = ReturnType<typeof createSql>;

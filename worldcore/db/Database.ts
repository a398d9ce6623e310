// worldcore/db/Database.ts
//
// Postgres connection layer. Exposes a configured pg Pool and a startup
// connectivity check. Nothing connects at import time; the first query opens
// a client. Game code never imports this directly: PostgresCharacterStore
// loads it lazily so tests and in-memory shards never touch a socket.
//
// Env variables:
//   MUD_DB_HOST, MUD_DB_PORT, MUD_DB_USER, MUD_DB_PASS, MUD_DB_NAME, MUD_DB_POOL_SIZE

import dotenv from "dotenv";
import { Pool } from "pg";

import { Logger } from "../utils/logger";

dotenv.config();

const log = Logger.scope("DB");

export const db = new Pool({
  host: process.env.MUD_DB_HOST,
  port: parseInt(process.env.MUD_DB_PORT || "5432", 10),
  user: process.env.MUD_DB_USER,
  password: process.env.MUD_DB_PASS,
  database: process.env.MUD_DB_NAME,
  max: parseInt(process.env.MUD_DB_POOL_SIZE || "10", 10),
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5_000,
});

// Errors on idle clients; the pool itself stays usable.
db.on("error", (err: Error) => {
  log.error("Postgres pool error", { err });
});

/** SELECT 1 smoke test. Logs and reports; the caller decides whether to stop. */
export async function testDbConnection(): Promise<boolean> {
  try {
    const r = await db.query<{ ok: number }>("SELECT 1 AS ok");
    log.success("Postgres connected", { ok: r.rows[0]?.ok });
    return true;
  } catch (err) {
    log.error("Postgres connection test failed", { err });
    return false;
  }
}

import { Pool } from "pg";
import { env } from "../config/env";

/** `sslmode=require` in the URL turns on TLS (managed Postgres); local URLs connect in plain text. */
const useSsl = /sslmode=require/.test(env.DATABASE_URL);

export const pool = new Pool({
  connectionString: env.DATABASE_URL,
  ...(useSsl && { ssl: { rejectUnauthorized: true } }),
});

export async function assertDatabaseConnection(): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query("SELECT 1");
  } finally {
    client.release();
  }
}

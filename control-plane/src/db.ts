import { createPool } from "@flowgraph/queue";
import type { Pool } from "pg";
import { config } from "./config.js";

const pool = createPool(config.databaseUrl);

export function getPool(): Pool {
  return pool;
}

import pg from "pg";
import type { Logger } from "pino";
import { AppConfig } from "../../config/env.js";
import { VectorIndex } from "../../domain/vectorIndex.js";
import { InMemoryVectorIndex } from "./inMemoryVectorIndex.js";
import { PersistentVectorIndex } from "./persistentVectorIndex.js";
import { PgVectorIndex } from "./pgVectorIndex.js";

export async function createVectorIndex(
  config: AppConfig["index"],
  logger?: Logger,
): Promise<VectorIndex> {
  if (config.store === "memory") {
    return new InMemoryVectorIndex(config.dimension, config.metric);
  }

  if (config.store === "file") {
    const index = new PersistentVectorIndex(config.path, config.dimension, config.metric, {
      maxBytes: config.maxBytes,
      logger,
    });
    await index.initialize();
    return index;
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when VECTOR_STORE=pgvector.");
  }

  const pool = new pg.Pool({
    connectionString: config.databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
  });
  const index = new PgVectorIndex(pool, config.dimension, config.metric);
  try {
    await index.initialize();
  } catch (error) {
    await pool.end();
    throw error;
  }
  return index;
}

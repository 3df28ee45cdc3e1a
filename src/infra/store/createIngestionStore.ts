import { AppConfig } from "../../config/env.js";
import { ConfigError } from "../../domain/errors.js";
import { IngestionStore } from "../../domain/ingestionStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryIngestionStore } from "./inMemoryIngestionStore.js";
import { PgIngestionStore } from "./pgIngestionStore.js";

export async function createIngestionStore(
  config: Pick<AppConfig, "storeBackend" | "databaseUrl" | "vectorDimension">,
): Promise<IngestionStore> {
  if (config.storeBackend === "memory") {
    return new InMemoryIngestionStore(config.vectorDimension);
  }

  if (!config.databaseUrl) {
    throw new ConfigError("DATABASE_URL is required for the postgres store.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const store = new PgIngestionStore(pool, config.vectorDimension);
  try {
    await store.initialize();
  } catch (error) {
    await pool.end();
    throw error;
  }
  return store;
}

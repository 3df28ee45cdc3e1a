import "dotenv/config";
import { loadConfig } from "../src/config/env.js";
import { IngestionAbortedError, describeError } from "../src/domain/errors.js";
import { createAppLogger } from "../src/infra/logging/logger.js";
import { loadQaDataset } from "../src/infra/parsers/datasetLoader.js";
import { createIngestionPipeline } from "../src/services/ingestionPipeline.js";

async function main(): Promise<number> {
  const config = loadConfig();
  const logger = createAppLogger({ level: config.logLevel, logFile: config.logFile });

  if (!config.datasetPath) {
    logger.error("DATASET_PATH environment variable not set");
    return 1;
  }

  logger.info("Starting Q&A ingestion");
  const pipeline = await createIngestionPipeline(config, logger);
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn("Interrupted; stopping after the current row");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    logger.info(`Loading dataset from ${config.datasetPath}`);
    const rows = await loadQaDataset(config.datasetPath, {
      onInvalidLine: (error) => logger.warn(`Skipping ${error.message}`),
    });
    logger.info(`Loaded ${rows.length.toLocaleString("en-US")} rows`);

    if (!pipeline.embeddingClient.initialize()) {
      logger.error("Embedding service is not available; aborting");
      return 1;
    }

    await pipeline.committer.ingest(rows, {
      strategy: config.chunkStrategy,
      limit: config.ingestLimit,
      progressInterval: config.progressInterval,
      commitInterval: config.commitInterval,
      signal: controller.signal,
    });

    const stats = await pipeline.store.getStatistics();
    logger.info("Database statistics:");
    for (const [key, value] of Object.entries(stats)) {
      logger.info(`  - ${key}: ${value.toLocaleString("en-US")}`);
    }

    const check = await pipeline.store.checkEmbeddings();
    if (check.hasEmbeddings) {
      logger.info("Embeddings stored");
      logger.info(`  - Embedding dimension: ${check.embeddingDimension}`);
      logger.info(`  - Sample text: ${check.sampleText}`);
    } else {
      logger.warn("No embeddings found");
    }
    return 0;
  } catch (error) {
    if (error instanceof IngestionAbortedError) {
      logger.warn(error.message);
      return 130;
    }
    logger.error(`Ingestion failed: ${describeError(error)}`);
    return 1;
  } finally {
    process.off("SIGINT", onInterrupt);
    await pipeline.close();
    logger.info("Exiting");
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error) => {
    console.error("Ingestion failed to start:", error);
    process.exitCode = 1;
  },
);

import { AppConfig } from "../config/env.js";
import { IngestionStore } from "../domain/ingestionStore.js";
import { EmbeddingClient } from "../infra/ai/embeddingClient.js";
import { OpenAiClient } from "../infra/ai/openAiClient.js";
import { RetryPolicy } from "../infra/ai/retryPolicy.js";
import { LogSink } from "../infra/logging/logger.js";
import { createIngestionStore } from "../infra/store/createIngestionStore.js";
import { Chunker } from "../pipelines/chunking.js";
import { BatchCommitter } from "./batchCommitter.js";
import { IngestionCoordinator } from "./ingestionCoordinator.js";
import { LoggingProgressReporter } from "./progressReporter.js";
import { ProvenanceStore } from "./provenanceStore.js";

export interface IngestionPipeline {
  store: IngestionStore;
  chunker: Chunker;
  embeddingClient: EmbeddingClient;
  committer: BatchCommitter;
  logger: LogSink;
  close: () => Promise<void>;
}

export function createEmbeddingClient(config: AppConfig, logger: LogSink): EmbeddingClient {
  return new EmbeddingClient({
    apiKey: config.openaiApiKey,
    dimensions: config.vectorDimension,
    maxBatchSize: config.embeddingMaxBatchSize,
    interBatchDelayMs: config.embeddingBatchDelayMs,
    retryPolicy: new RetryPolicy({
      maxAttempts: config.embeddingMaxAttempts,
      baseDelayMs: config.embeddingRetryBaseMs,
      maxDelayMs: config.embeddingRetryMaxMs,
    }),
    createProvider: (apiKey) =>
      new OpenAiClient({
        apiKey,
        baseUrl: config.openaiBaseUrl,
        embeddingModel: config.embeddingModel,
        dimensions: config.vectorDimension,
      }),
    logger,
  });
}

/**
 * Wires store, chunker, embedding client and the two orchestration layers.
 * The embedding client still needs `initialize()` before a run.
 */
export async function createIngestionPipeline(
  config: AppConfig,
  logger: LogSink,
): Promise<IngestionPipeline> {
  const store = await createIngestionStore(config);
  const chunker = new Chunker();
  const embeddingClient = createEmbeddingClient(config, logger);
  const coordinator = new IngestionCoordinator({
    chunker,
    embeddings: embeddingClient,
    provenance: new ProvenanceStore(logger),
    logger,
  });
  const committer = new BatchCommitter({
    store,
    coordinator,
    embeddings: embeddingClient,
    reporter: new LoggingProgressReporter(logger),
  });

  return {
    store,
    chunker,
    embeddingClient,
    committer,
    logger,
    close: () => store.close(),
  };
}

import {
  EmbeddingDimensionError,
  EmbeddingUninitializedError,
  IngestionError,
  describeError,
} from "../../domain/errors.js";
import { LogSink } from "../logging/logger.js";
import { RetryPolicy } from "./retryPolicy.js";
import { EmbeddingProvider, EmbeddingProviderFactory, EmbeddingService } from "./types.js";

export interface EmbeddingClientOptions {
  apiKey: string | null;
  dimensions: number;
  createProvider: EmbeddingProviderFactory;
  logger: LogSink;
  maxBatchSize?: number;
  interBatchDelayMs?: number;
  retryPolicy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_MAX_BATCH_SIZE = 100;
const DEFAULT_INTER_BATCH_DELAY_MS = 100;

export class EmbeddingClient implements EmbeddingService {
  private provider: EmbeddingProvider | null = null;

  private readonly maxBatchSize: number;

  private readonly interBatchDelayMs: number;

  private readonly retryPolicy: RetryPolicy;

  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: EmbeddingClientOptions) {
    this.maxBatchSize = Math.max(1, Math.floor(options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE));
    this.interBatchDelayMs = Math.max(0, options.interBatchDelayMs ?? DEFAULT_INTER_BATCH_DELAY_MS);
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.sleep =
      options.sleep ?? ((ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  }

  initialize(): boolean {
    if (!this.options.apiKey) {
      this.options.logger.warn("Embedding API key not found in environment");
      return false;
    }

    try {
      this.provider = this.options.createProvider(this.options.apiKey);
    } catch (error) {
      this.options.logger.error(`Failed to initialize embedding provider: ${describeError(error)}`);
      this.provider = null;
      return false;
    }

    this.options.logger.info("Embedding provider initialized");
    return true;
  }

  isAvailable(): boolean {
    return this.provider !== null;
  }

  getDimensions(): number {
    return this.options.dimensions;
  }

  async embed(text: string): Promise<number[]> {
    const provider = this.requireProvider();
    const [embedding] = await this.callProvider(provider, [text]);
    return embedding;
  }

  /** Order-preserving; oversized batches go out as paced sequential sub-batches. */
  async embedBatch(texts: string[]): Promise<number[][]> {
    const provider = this.requireProvider();
    if (texts.length === 0) {
      return [];
    }
    if (texts.length <= this.maxBatchSize) {
      return this.callProvider(provider, texts);
    }

    this.options.logger.debug(
      `Large batch detected (${texts.length} texts), splitting into batches of ${this.maxBatchSize}`,
    );
    const embeddings: number[][] = [];
    for (let start = 0; start < texts.length; start += this.maxBatchSize) {
      if (start > 0 && this.interBatchDelayMs > 0) {
        await this.sleep(this.interBatchDelayMs);
      }
      const batch = texts.slice(start, start + this.maxBatchSize);
      embeddings.push(...(await this.callProvider(provider, batch)));
    }
    return embeddings;
  }

  private async callProvider(
    provider: EmbeddingProvider,
    texts: string[],
  ): Promise<number[][]> {
    const embeddings = await this.retryPolicy.execute(
      () => provider.embed(texts),
      ({ attempt, delayMs, error }) => {
        this.options.logger.warn(
          `Embedding request for ${texts.length} texts failed (attempt ${attempt}/${this.retryPolicy.maxAttempts}), retrying in ${delayMs}ms: ${describeError(error)}`,
        );
      },
    );

    if (embeddings.length !== texts.length) {
      throw new IngestionError(
        `Embedding count mismatch: sent ${texts.length} texts, received ${embeddings.length} vectors.`,
      );
    }
    for (const embedding of embeddings) {
      if (embedding.length !== this.options.dimensions) {
        throw new EmbeddingDimensionError(this.options.dimensions, embedding.length);
      }
    }
    return embeddings;
  }

  private requireProvider(): EmbeddingProvider {
    if (!this.provider) {
      throw new EmbeddingUninitializedError();
    }
    return this.provider;
  }
}

import { EmbeddingProvider } from "../../src/infra/ai/types.js";
import { EmbeddingClient } from "../../src/infra/ai/embeddingClient.js";
import { RetryPolicy } from "../../src/infra/ai/retryPolicy.js";
import { createSilentLogger } from "../../src/infra/logging/logger.js";

export const TEST_DIMENSIONS = 4;

export const noSleep = async (_ms: number): Promise<void> => {};

// Deterministic vectors derived from the text, so equal inputs embed equally.
export function fakeVector(text: string, dimensions = TEST_DIMENSIONS): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  vector[0] = text.length;
  for (let i = 0; i < text.length; i += 1) {
    vector[(i % (dimensions - 1)) + 1] += text.charCodeAt(i) / 1000;
  }
  return vector;
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[][] = [];

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => fakeVector(text));
  }
}

export function createTestEmbeddingClient(
  provider: EmbeddingProvider = new FakeEmbeddingProvider(),
  options: { maxBatchSize?: number; maxAttempts?: number } = {},
): EmbeddingClient {
  const client = new EmbeddingClient({
    apiKey: "test-secret",
    dimensions: TEST_DIMENSIONS,
    createProvider: () => provider,
    logger: createSilentLogger(),
    maxBatchSize: options.maxBatchSize,
    interBatchDelayMs: 0,
    retryPolicy: new RetryPolicy({ maxAttempts: options.maxAttempts ?? 5, sleep: noSleep }),
    sleep: noSleep,
  });
  client.initialize();
  return client;
}

import { describe, expect, it, vi } from "vitest";
import { CommitError, IngestionAbortedError } from "../src/domain/errors.js";
import { QaRow } from "../src/domain/types.js";
import { EmbeddingProvider } from "../src/infra/ai/types.js";
import { createSilentLogger } from "../src/infra/logging/logger.js";
import { InMemoryIngestionStore } from "../src/infra/store/inMemoryIngestionStore.js";
import { Chunker } from "../src/pipelines/chunking.js";
import { BatchCommitter } from "../src/services/batchCommitter.js";
import { IngestionCoordinator } from "../src/services/ingestionCoordinator.js";
import { IngestionEvent, ProgressReporter } from "../src/services/progressReporter.js";
import { ProvenanceStore } from "../src/services/provenanceStore.js";
import {
  createTestEmbeddingClient,
  FakeEmbeddingProvider,
  TEST_DIMENSIONS,
} from "./support/fakes.js";

class RecordingReporter implements ProgressReporter {
  readonly events: IngestionEvent[] = [];

  report(event: IngestionEvent): void {
    this.events.push(event);
  }

  ofType<T extends IngestionEvent["type"]>(type: T) {
    return this.events.filter(
      (event): event is Extract<IngestionEvent, { type: T }> => event.type === type,
    );
  }
}

function makeRows(count: number): QaRow[] {
  return Array.from({ length: count }, (_, i) => ({
    copyright: i % 2 === 0 ? "Example Press" : "Sample Books",
    url: `https://example.test/q/${i + 1}`,
    question: `Question ${i + 1}?`,
    answer: `Answer number ${i + 1}.`,
  }));
}

function createHarness(
  options: { provider?: EmbeddingProvider; available?: boolean; clock?: () => number } = {},
) {
  const store = new InMemoryIngestionStore(TEST_DIMENSIONS);
  const embeddings = createTestEmbeddingClient(options.provider ?? new FakeEmbeddingProvider(), {
    maxAttempts: 1,
  });
  const reporter = new RecordingReporter();
  const coordinator = new IngestionCoordinator({
    chunker: new Chunker(),
    embeddings,
    provenance: new ProvenanceStore(createSilentLogger()),
    logger: createSilentLogger(),
  });
  const committer = new BatchCommitter({
    store,
    coordinator,
    embeddings: { isAvailable: () => options.available ?? true },
    reporter,
    clock: options.clock,
  });
  return { store, reporter, committer };
}

describe("BatchCommitter", () => {
  it("commits every interval and once more at the end", async () => {
    const { store, reporter, committer } = createHarness();

    const summary = await committer.ingest(makeRows(123), { commitInterval: 50 });

    expect(summary).toEqual({ processedRows: 123, totalChunks: 246, failedRows: 0 });
    expect(reporter.ofType("commit").map((event) => event.processed)).toEqual([50, 100, 123]);
    expect(reporter.ofType("progress").map((event) => event.processed)).toEqual([100]);
    await expect(store.getStatistics()).resolves.toEqual({
      copyright_holders: 2,
      sources: 123,
      chunks: 246,
    });
  });

  it("stops after the row limit", async () => {
    const { store, reporter, committer } = createHarness();

    const summary = await committer.ingest(makeRows(10), { limit: 3 });

    expect(summary.processedRows).toBe(3);
    expect(reporter.events[0]).toEqual({ type: "start", totalRows: 3, strategy: "recursive" });
    await expect(store.getStatistics()).resolves.toMatchObject({ sources: 3 });
  });

  it("ingests nothing when the limit is zero", async () => {
    const { committer } = createHarness();

    await expect(committer.ingest(makeRows(5), { limit: 0 })).resolves.toEqual({
      processedRows: 0,
      totalChunks: 0,
      failedRows: 0,
    });
  });

  it("returns zeros without opening a session when embeddings are unavailable", async () => {
    const { store, reporter, committer } = createHarness({ available: false });
    const openSession = vi.spyOn(store, "openSession");

    const summary = await committer.ingest(makeRows(5));

    expect(summary).toEqual({ processedRows: 0, totalChunks: 0, failedRows: 0 });
    expect(openSession).not.toHaveBeenCalled();
    expect(reporter.events).toEqual([
      { type: "start", totalRows: 5, strategy: "recursive" },
      { type: "error", message: "Embedding service not available", context: "ingest" },
    ]);
  });

  it("counts failed rows separately and keeps going", async () => {
    const provider = new FakeEmbeddingProvider();
    const original = provider.embed.bind(provider);
    vi.spyOn(provider, "embed").mockImplementation(async (texts) => {
      if (texts.includes("Question 2?")) {
        throw new Error("content rejected");
      }
      return original(texts);
    });
    const { store, reporter, committer } = createHarness({ provider });

    const summary = await committer.ingest(makeRows(4));

    expect(summary).toEqual({ processedRows: 3, totalChunks: 6, failedRows: 1 });
    expect(reporter.ofType("complete")[0]).toMatchObject({
      processed: 3,
      chunksCreated: 6,
      failedRows: 1,
    });
    await expect(store.getStatistics()).resolves.toMatchObject({ sources: 3, chunks: 6 });
  });

  it("reports progress with rate and ETA", async () => {
    let now = 0;
    const { reporter, committer } = createHarness({ clock: () => (now += 1000) });

    await committer.ingest(makeRows(4), { progressInterval: 2 });

    expect(reporter.ofType("progress")).toEqual([
      {
        type: "progress",
        processed: 2,
        totalRows: 4,
        percentage: 50,
        chunksCreated: 4,
        rowsPerSecond: 2,
        etaSeconds: 1,
      },
      {
        type: "progress",
        processed: 4,
        totalRows: 4,
        percentage: 100,
        chunksCreated: 8,
        rowsPerSecond: 2,
        etaSeconds: 0,
      },
    ]);
    const [complete] = reporter.ofType("complete");
    expect(complete.elapsedSeconds).toBe(3);
    expect(complete.rowsPerSecond).toBeCloseTo(4 / 3);
  });

  it("accepts streamed rows with a declared total", async () => {
    const { reporter, committer } = createHarness();
    async function* stream() {
      yield* makeRows(3);
    }

    const summary = await committer.ingest(stream(), { totalRows: 3 });

    expect(summary.processedRows).toBe(3);
    expect(reporter.events[0]).toEqual({ type: "start", totalRows: 3, strategy: "recursive" });
  });

  it("rolls back and surfaces a failed commit", async () => {
    const { store, reporter, committer } = createHarness();
    const session = await store.openSession();
    vi.spyOn(session, "commit").mockRejectedValue(new Error("disk full"));
    const rollback = vi.spyOn(session, "rollback");
    vi.spyOn(store, "openSession").mockResolvedValue(session);

    const error = await committer
      .ingest(makeRows(3), { commitInterval: 2 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CommitError);
    expect(error).toHaveProperty("message", "Commit failed after 2 rows: disk full");
    expect(rollback).toHaveBeenCalled();
    expect(reporter.ofType("error")).toEqual([
      {
        type: "error",
        message: "Commit failed after 2 rows: disk full",
        context: "ingest (last commit at 0 rows, 0 chunks)",
      },
    ]);
    await expect(store.getStatistics()).resolves.toEqual({
      copyright_holders: 0,
      sources: 0,
      chunks: 0,
    });
  });

  it("stops on abort and keeps what was already committed", async () => {
    const { store, committer } = createHarness();
    const controller = new AbortController();
    const [first, second, third] = makeRows(3);
    async function* stream() {
      yield first;
      yield second;
      controller.abort();
      yield third;
    }

    const error = await committer
      .ingest(stream(), { commitInterval: 1, signal: controller.signal })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(IngestionAbortedError);
    expect(error).toHaveProperty("processed", 2);
    await expect(store.getStatistics()).resolves.toEqual({
      copyright_holders: 2,
      sources: 2,
      chunks: 4,
    });
  });
});

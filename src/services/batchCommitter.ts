import {
  CommitError,
  IngestionAbortedError,
  describeError,
} from "../domain/errors.js";
import { IngestionSession, IngestionStore } from "../domain/ingestionStore.js";
import { IngestionSummary, QaRow } from "../domain/types.js";
import { EmbeddingService } from "../infra/ai/types.js";
import { DEFAULT_CHUNK_STRATEGY } from "../pipelines/chunking.js";
import { IngestionCoordinator, RowOutcome } from "./ingestionCoordinator.js";
import { ProgressReporter } from "./progressReporter.js";

export type RowSource = Iterable<QaRow> | AsyncIterable<QaRow>;

export interface IngestOptions {
  strategy?: string;
  limit?: number | null;
  progressInterval?: number;
  commitInterval?: number;
  /** Row count for streamed sources; arrays report their own length. */
  totalRows?: number | null;
  signal?: AbortSignal;
}

export interface BatchCommitterDeps {
  store: IngestionStore;
  coordinator: IngestionCoordinator;
  embeddings: Pick<EmbeddingService, "isAvailable">;
  reporter: ProgressReporter;
  clock?: () => number;
}

interface IngestionAccumulator {
  processed: number;
  chunks: number;
  failures: number;
}

const EMPTY_ACCUMULATOR: IngestionAccumulator = { processed: 0, chunks: 0, failures: 0 };

export class BatchCommitter {
  private readonly clock: () => number;

  constructor(private readonly deps: BatchCommitterDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async ingest(rows: RowSource, options: IngestOptions = {}): Promise<IngestionSummary> {
    const strategy = options.strategy ?? DEFAULT_CHUNK_STRATEGY;
    const progressInterval = positiveInterval(options.progressInterval, 100);
    const commitInterval = positiveInterval(options.commitInterval, 50);
    const limit = options.limit ?? null;
    const totalRows = resolveTotalRows(rows, limit, options.totalRows ?? null);

    this.deps.reporter.report({ type: "start", totalRows, strategy });

    if (!this.deps.embeddings.isAvailable()) {
      this.deps.reporter.report({
        type: "error",
        message: "Embedding service not available",
        context: "ingest",
      });
      return { processedRows: 0, totalChunks: 0, failedRows: 0 };
    }

    const startedAt = this.clock();
    let acc = EMPTY_ACCUMULATOR;
    let committed = EMPTY_ACCUMULATOR;
    const session = await this.deps.store.openSession();

    try {
      for await (const row of takeRows(rows, limit)) {
        if (options.signal?.aborted) {
          throw new IngestionAbortedError(acc.processed);
        }

        const outcome = await this.deps.coordinator.processRow(session, row, strategy);
        acc = accumulate(acc, outcome);

        if (acc.processed % commitInterval === 0) {
          await this.commit(session, acc);
          committed = acc;
        }

        if (acc.processed % progressInterval === 0) {
          this.reportProgress(acc, totalRows, startedAt);
        }
      }

      await this.commit(session, acc);
      committed = acc;
    } catch (error) {
      await this.rollbackAfterFailure(session);
      this.deps.reporter.report({
        type: "error",
        message: describeError(error),
        context: `ingest (last commit at ${committed.processed} rows, ${committed.chunks} chunks)`,
      });
      throw error;
    } finally {
      await this.closeSession(session);
    }

    const elapsedSeconds = (this.clock() - startedAt) / 1000;
    this.deps.reporter.report({
      type: "complete",
      processed: acc.processed - acc.failures,
      chunksCreated: acc.chunks,
      failedRows: acc.failures,
      elapsedSeconds,
      rowsPerSecond: elapsedSeconds > 0 ? acc.processed / elapsedSeconds : 0,
    });

    return {
      processedRows: acc.processed - acc.failures,
      totalChunks: acc.chunks,
      failedRows: acc.failures,
    };
  }

  private async commit(session: IngestionSession, acc: IngestionAccumulator) {
    try {
      await session.commit();
    } catch (error) {
      throw new CommitError(acc.processed, error);
    }
    this.deps.reporter.report({
      type: "commit",
      processed: acc.processed,
      chunksCreated: acc.chunks,
    });
  }

  // A failed rollback must not mask the error that caused it.
  private async rollbackAfterFailure(session: IngestionSession) {
    try {
      await session.rollback();
    } catch (rollbackError) {
      this.deps.reporter.report({
        type: "error",
        message: describeError(rollbackError),
        context: "rollback",
      });
    }
  }

  private async closeSession(session: IngestionSession) {
    try {
      await session.close();
    } catch (closeError) {
      this.deps.reporter.report({
        type: "error",
        message: describeError(closeError),
        context: "close session",
      });
    }
  }

  private reportProgress(
    acc: IngestionAccumulator,
    totalRows: number | null,
    startedAt: number,
  ) {
    const elapsedSeconds = (this.clock() - startedAt) / 1000;
    const rowsPerSecond = elapsedSeconds > 0 ? acc.processed / elapsedSeconds : 0;
    const etaSeconds =
      totalRows !== null && rowsPerSecond > 0
        ? Math.max(0, totalRows - acc.processed) / rowsPerSecond
        : null;

    this.deps.reporter.report({
      type: "progress",
      processed: acc.processed,
      totalRows,
      percentage: totalRows ? (acc.processed / totalRows) * 100 : null,
      chunksCreated: acc.chunks,
      rowsPerSecond,
      etaSeconds,
    });
  }
}

function accumulate(acc: IngestionAccumulator, outcome: RowOutcome): IngestionAccumulator {
  return {
    processed: acc.processed + 1,
    chunks: acc.chunks + outcome.chunkCount,
    failures: acc.failures + (outcome.status === "failed" ? 1 : 0),
  };
}

async function* takeRows(rows: RowSource, limit: number | null): AsyncGenerator<QaRow> {
  if (limit !== null && limit <= 0) {
    return;
  }
  let taken = 0;
  for await (const row of rows) {
    yield row;
    taken += 1;
    if (limit !== null && taken >= limit) {
      return;
    }
  }
}

function resolveTotalRows(
  rows: RowSource,
  limit: number | null,
  declared: number | null,
): number | null {
  const known = Array.isArray(rows) ? rows.length : declared;
  if (known === null) {
    return null;
  }
  return limit === null ? known : Math.min(known, Math.max(0, limit));
}

function positiveInterval(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value) || value < 1) {
    return fallback;
  }
  return Math.floor(value);
}

import { describe, expect, it, vi } from "vitest";
import { LoggingProgressReporter } from "../src/services/progressReporter.js";

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const fixedNow = () => new Date(2024, 0, 2, 3, 4, 5);

describe("LoggingProgressReporter", () => {
  it("prints a start banner", () => {
    const logger = createLogger();
    const reporter = new LoggingProgressReporter(logger, fixedNow);

    reporter.report({ type: "start", totalRows: 12345, strategy: "token" });

    expect(logger.info.mock.calls.map(([line]) => line)).toEqual([
      "=".repeat(60),
      "Starting ingestion",
      "Total rows: 12,345",
      "Chunk strategy: token",
      "Started at: 2024-01-02 03:04:05",
      "=".repeat(60),
    ]);
  });

  it("prints one progress line", () => {
    const logger = createLogger();
    const reporter = new LoggingProgressReporter(logger, fixedNow);

    reporter.report({
      type: "progress",
      processed: 1500,
      totalRows: 6000,
      percentage: 25,
      chunksCreated: 4200,
      rowsPerSecond: 12.34,
      etaSeconds: 364.6,
    });

    expect(logger.info).toHaveBeenCalledWith(
      "Progress: 1,500/6,000 (25.0%) | chunks: 4,200 | rate: 12.3 rows/sec | ETA: 365s",
    );
  });

  it("prints unknown totals without a percentage", () => {
    const logger = createLogger();
    const reporter = new LoggingProgressReporter(logger, fixedNow);

    reporter.report({
      type: "progress",
      processed: 10,
      totalRows: null,
      percentage: null,
      chunksCreated: 20,
      rowsPerSecond: 0,
      etaSeconds: null,
    });

    expect(logger.info).toHaveBeenCalledWith(
      "Progress: 10/? | chunks: 20 | rate: 0.0 rows/sec | ETA: unknown",
    );
  });

  it("prints commits and errors", () => {
    const logger = createLogger();
    const reporter = new LoggingProgressReporter(logger, fixedNow);

    reporter.report({ type: "commit", processed: 1000, chunksCreated: 2500 });
    reporter.report({ type: "error", message: "disk full", context: "ingest" });

    expect(logger.info).toHaveBeenCalledWith("Committed 1,000 rows (2,500 chunks so far)");
    expect(logger.error).toHaveBeenCalledWith("Error (ingest): disk full");
  });

  it("prints a completion summary", () => {
    const logger = createLogger();
    const reporter = new LoggingProgressReporter(logger, fixedNow);

    reporter.report({
      type: "complete",
      processed: 98,
      chunksCreated: 250,
      failedRows: 2,
      elapsedSeconds: 12.5,
      rowsPerSecond: 8,
    });

    expect(logger.info.mock.calls.map(([line]) => line)).toEqual([
      "=".repeat(60),
      "Ingestion complete",
      "Processed rows: 98",
      "Failed rows: 2",
      "Chunks created: 250",
      "Elapsed: 12.50s",
      "Average rate: 8.0 rows/sec",
      "Finished at: 2024-01-02 03:04:05",
      "=".repeat(60),
    ]);
  });
});

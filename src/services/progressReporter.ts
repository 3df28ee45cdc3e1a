import { LogSink } from "../infra/logging/logger.js";

export type IngestionEvent =
  | { type: "start"; totalRows: number | null; strategy: string }
  | {
      type: "progress";
      processed: number;
      totalRows: number | null;
      percentage: number | null;
      chunksCreated: number;
      rowsPerSecond: number;
      etaSeconds: number | null;
    }
  | { type: "commit"; processed: number; chunksCreated: number }
  | {
      type: "complete";
      processed: number;
      chunksCreated: number;
      failedRows: number;
      elapsedSeconds: number;
      rowsPerSecond: number;
    }
  | { type: "error"; message: string; context: string };

export interface ProgressReporter {
  report(event: IngestionEvent): void;
}

const RULE = "=".repeat(60);

const countFormat = new Intl.NumberFormat("en-US");

export class LoggingProgressReporter implements ProgressReporter {
  constructor(
    private readonly logger: LogSink,
    private readonly now: () => Date = () => new Date(),
  ) {}

  report(event: IngestionEvent): void {
    switch (event.type) {
      case "start":
        this.logger.info(RULE);
        this.logger.info("Starting ingestion");
        this.logger.info(
          `Total rows: ${event.totalRows === null ? "unknown" : formatCount(event.totalRows)}`,
        );
        this.logger.info(`Chunk strategy: ${event.strategy}`);
        this.logger.info(`Started at: ${formatTimestamp(this.now())}`);
        this.logger.info(RULE);
        return;
      case "progress": {
        const total = event.totalRows === null ? "?" : formatCount(event.totalRows);
        const percentage =
          event.percentage === null ? "" : ` (${event.percentage.toFixed(1)}%)`;
        const eta = event.etaSeconds === null ? "unknown" : `${event.etaSeconds.toFixed(0)}s`;
        this.logger.info(
          `Progress: ${formatCount(event.processed)}/${total}${percentage} | ` +
            `chunks: ${formatCount(event.chunksCreated)} | ` +
            `rate: ${event.rowsPerSecond.toFixed(1)} rows/sec | ` +
            `ETA: ${eta}`,
        );
        return;
      }
      case "commit":
        this.logger.info(
          `Committed ${formatCount(event.processed)} rows (${formatCount(event.chunksCreated)} chunks so far)`,
        );
        return;
      case "complete":
        this.logger.info(RULE);
        this.logger.info("Ingestion complete");
        this.logger.info(`Processed rows: ${formatCount(event.processed)}`);
        this.logger.info(`Failed rows: ${formatCount(event.failedRows)}`);
        this.logger.info(`Chunks created: ${formatCount(event.chunksCreated)}`);
        this.logger.info(`Elapsed: ${event.elapsedSeconds.toFixed(2)}s`);
        this.logger.info(`Average rate: ${event.rowsPerSecond.toFixed(1)} rows/sec`);
        this.logger.info(`Finished at: ${formatTimestamp(this.now())}`);
        this.logger.info(RULE);
        return;
      case "error":
        this.logger.error(`Error (${event.context}): ${event.message}`);
        return;
    }
  }
}

function formatCount(value: number): string {
  return countFormat.format(value);
}

function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

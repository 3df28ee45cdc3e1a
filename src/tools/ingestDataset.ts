import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { describeError } from "../domain/errors.js";
import { loadQaDataset } from "../infra/parsers/datasetLoader.js";
import { IngestionPipeline } from "../services/ingestionPipeline.js";

export interface IngestDefaults {
  strategy: string;
  progressInterval: number;
  commitInterval: number;
}

export function registerIngestDatasetTool(
  server: McpServer,
  pipeline: IngestionPipeline,
  defaults: IngestDefaults,
) {
  server.registerTool(
    "ingest_dataset",
    {
      title: "Ingest Q&A Dataset",
      description:
        "Chunks, embeds and stores a JSONL question/answer dataset (local path or http(s) URL).",
      inputSchema: {
        path: z.string().min(1).describe("JSONL file path or http(s) URL"),
        strategy: z.string().optional().describe("Chunk strategy for answers"),
        limit: z.number().int().nonnegative().optional().describe("Maximum rows to ingest"),
        progress_interval: z.number().int().positive().optional(),
        commit_interval: z.number().int().positive().optional(),
      },
    },
    async ({ path, strategy, limit, progress_interval, commit_interval }) => {
      if (!pipeline.embeddingClient.isAvailable()) {
        return toolError("Embedding service is not available. Configure OPENAI_API_KEY.");
      }

      try {
        const rows = await loadQaDataset(path, {
          onInvalidLine: (error) => pipeline.logger.warn(`Skipping ${error.message}`),
        });
        const summary = await pipeline.committer.ingest(rows, {
          strategy: strategy ?? defaults.strategy,
          limit: limit ?? null,
          progressInterval: progress_interval ?? defaults.progressInterval,
          commitInterval: commit_interval ?? defaults.commitInterval,
        });

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(
                {
                  processed_rows: summary.processedRows,
                  failed_rows: summary.failedRows,
                  total_chunks: summary.totalChunks,
                },
                null,
                2,
              ),
            },
          ],
        };
      } catch (error) {
        return toolError(describeError(error));
      }
    },
  );
}

function toolError(message: string) {
  return {
    isError: true,
    content: [{ type: "text" as const, text: message }],
  };
}

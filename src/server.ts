import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { z } from "zod";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { createAppLogger } from "./infra/logging/logger.js";
import { createIngestionPipeline, IngestionPipeline } from "./services/ingestionPipeline.js";
import { IngestDefaults, registerIngestDatasetTool } from "./tools/ingestDataset.js";
import { registerInspectStoreTools } from "./tools/inspectStore.js";
import { registerListChunkStrategiesTool } from "./tools/listChunkStrategies.js";

async function main() {
  const config = loadConfig();
  const logger = createAppLogger({
    level: config.logLevel,
    logFile: config.logFile,
    consoleToStderr: true,
  });

  const pipeline = await createIngestionPipeline(config, logger);
  if (!pipeline.embeddingClient.initialize()) {
    logger.warn("Embedding service is not available; ingest_dataset will refuse to run");
  }

  const server = createAppServer(pipeline, {
    strategy: config.chunkStrategy,
    progressInterval: config.progressInterval,
    commitInterval: config.commitInterval,
  });
  await server.connect(new StdioServerTransport());
  logger.info("MCP ingestion server ready on stdio");

  const shutdown = () => {
    server
      .close()
      .then(() => pipeline.close())
      .then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error(`Shutdown failed: ${describeError(error)}`);
          process.exit(1);
        },
      );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

function createAppServer(pipeline: IngestionPipeline, defaults: IngestDefaults): McpServer {
  const server = new McpServer({
    name: "qa-embed-ingest",
    version: "0.1.0",
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      const embeddings = pipeline.embeddingClient.isAvailable() ? "available" : "unavailable";
      return {
        content: [
          {
            type: "text",
            text: `qa-embed-ingest is running (embeddings ${embeddings}). hello ${who}`,
          },
        ],
      };
    },
  );

  registerIngestDatasetTool(server, pipeline, defaults);
  registerInspectStoreTools(server, pipeline.store);
  registerListChunkStrategiesTool(server, pipeline.chunker);

  return server;
}

main().catch((error) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});

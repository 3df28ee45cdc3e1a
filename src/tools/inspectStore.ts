import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { IngestionStore } from "../domain/ingestionStore.js";

export function registerInspectStoreTools(server: McpServer, store: IngestionStore) {
  server.registerTool(
    "database_statistics",
    {
      title: "Database Statistics",
      description: "Counts copyright holders, sources and chunks in the store.",
      inputSchema: {},
    },
    async () => {
      const stats = await store.getStatistics();
      return {
        content: [{ type: "text", text: JSON.stringify(stats, null, 2) }],
      };
    },
  );

  server.registerTool(
    "check_embeddings",
    {
      title: "Check Embeddings",
      description: "Reports whether stored chunks carry embeddings and their dimension.",
      inputSchema: {},
    },
    async () => {
      const check = await store.checkEmbeddings();
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                has_embeddings: check.hasEmbeddings,
                embedding_dimension: check.embeddingDimension,
                sample_text: check.sampleText,
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );

  server.registerTool(
    "list_chunks",
    {
      title: "List Chunks",
      description: "Lists stored chunks with their provenance, optionally for one source URL.",
      inputSchema: {
        source_url: z.string().optional().describe("Only chunks of this source"),
        limit: z.number().int().positive().max(500).optional(),
      },
    },
    async ({ source_url, limit }) => {
      const chunks = await store.listChunks({ sourceUrl: source_url, limit: limit ?? 50 });
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                chunks: chunks.map(({ chunk, source, copyrightHolder }) => ({
                  chunk_id: chunk.id,
                  copyright_holder: copyrightHolder,
                  url: source.url,
                  chunk_index: chunk.metadata.chunk_info.chunk_index,
                  type: chunk.metadata.type,
                  content: chunk.content,
                  embedding_dimension: chunk.embedding.length,
                })),
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}

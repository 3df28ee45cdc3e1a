import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Chunker, DEFAULT_CHUNK_STRATEGY } from "../pipelines/chunking.js";

export function registerListChunkStrategiesTool(server: McpServer, chunker: Chunker) {
  server.registerTool(
    "list_chunk_strategies",
    {
      title: "List Chunk Strategies",
      description: "Lists the registered answer chunking strategies.",
      inputSchema: {},
    },
    async () => ({
      content: [
        {
          type: "text",
          text: JSON.stringify(
            {
              strategies: chunker.listStrategies(),
              fallback: DEFAULT_CHUNK_STRATEGY,
            },
            null,
            2,
          ),
        },
      ],
    }),
  );
}

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { LegalQaService } from "../services/legalQaService.js";
import { summarizeSnippet } from "../utils/text.js";

export function registerSearchPassagesTool(server: McpServer, service: LegalQaService) {
  server.registerTool(
    "search_passages",
    {
      title: "Search Passages",
      description: "Retrieves the top matching passages from the indexed legal documents.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        top_k: z.number().int().min(1).max(20).optional().describe("Max hits"),
        source_type: z.string().optional().describe("Restrict search to one source type"),
      },
    },
    async ({ query, top_k, source_type }) => {
      const hits = await service.searchPassages(
        query,
        top_k,
        source_type ? { sourceType: source_type } : undefined,
      );

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                query,
                hits: hits.map((hit) => ({
                  score: Number(hit.score.toFixed(4)),
                  document_id: hit.documentId,
                  title: hit.metadata.title,
                  section: hit.metadata.section,
                  chunk_id: hit.chunkId,
                  snippet: summarizeSnippet(hit.text),
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

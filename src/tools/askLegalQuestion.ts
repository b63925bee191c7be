import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { LegalQaService } from "../services/legalQaService.js";

export function registerAskLegalQuestionTool(server: McpServer, service: LegalQaService) {
  server.registerTool(
    "ask_legal_question",
    {
      title: "Ask Legal Question",
      description:
        "Answers a question from the indexed legal documents with a confidence score and cited sources.",
      inputSchema: {
        question: z.string().min(2).describe("Question about the indexed legal documents"),
        top_k: z.number().int().min(1).max(20).optional().describe("Passages to retrieve"),
        source_type: z
          .string()
          .optional()
          .describe("Restrict retrieval to one source type, e.g. statute"),
      },
    },
    async ({ question, top_k, source_type }) => {
      const startedAt = Date.now();
      const result = await service.chat({
        message: question,
        topK: top_k,
        filter: source_type ? { sourceType: source_type } : undefined,
      });

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                answer: result.response,
                confidence: Number(result.confidence.toFixed(4)),
                sources: result.sources,
                latency_ms: Date.now() - startedAt,
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

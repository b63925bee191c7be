import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { describeError } from "../infra/ai/retry.js";
import { IngestResult } from "../pipelines/ingestion.js";
import { LegalQaService } from "../services/legalQaService.js";

export function registerIngestDocumentTool(server: McpServer, service: LegalQaService) {
  server.registerTool(
    "ingest_document",
    {
      title: "Ingest Document",
      description:
        "Adds a legal document to the index, either from a local .txt/.md/.pdf path or from inline text.",
      inputSchema: {
        path: z.string().optional().describe("Local file path to ingest"),
        title: z.string().optional().describe("Document title (required with content)"),
        content: z.string().optional().describe("Inline document text"),
        source_type: z.string().optional().describe("Source type, e.g. statute or judgment"),
      },
    },
    async ({ path, title, content, source_type }) => {
      let result: IngestResult;
      try {
        if (path) {
          result = await service.ingestFile(path, source_type);
        } else if (content && title) {
          result = await service.ingestText({ title, content, sourceType: source_type });
        } else {
          throw new Error("Provide either `path` or both `title` and `content`.");
        }
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: "text",
              text: JSON.stringify({ status: "error", document_id: null, error: describeError(error) }),
            },
          ],
        };
      }

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              { status: "ok", document_id: result.documentId, chunk_count: result.chunkCount },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}

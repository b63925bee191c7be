import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { LegalQaService } from "../services/legalQaService.js";

export function registerListDocumentsTool(server: McpServer, service: LegalQaService) {
  server.registerTool(
    "list_documents",
    {
      title: "List Documents",
      description: "Lists indexed legal documents and their metadata.",
      inputSchema: {},
    },
    async () => {
      const documents = await service.listDocuments();

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({ documents }, null, 2),
          },
        ],
      };
    },
  );
}

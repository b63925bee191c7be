import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { LegalQaService } from "../services/legalQaService.js";

export function registerHealthCheckTool(server: McpServer, service: LegalQaService) {
  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Reports reachability of the vector index and the embedding model.",
      inputSchema: {},
    },
    async () => {
      const report = await service.health();

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(report, null, 2),
          },
        ],
      };
    },
  );
}

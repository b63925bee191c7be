import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { LegalQaService } from "./services/legalQaService.js";
import { registerAskLegalQuestionTool } from "./tools/askLegalQuestion.js";
import { registerHealthCheckTool } from "./tools/healthCheck.js";
import { registerIngestDocumentTool } from "./tools/ingestDocument.js";
import { registerListDocumentsTool } from "./tools/listDocuments.js";
import { registerSearchPassagesTool } from "./tools/searchPassages.js";

export function createMcpServer(service: LegalQaService): McpServer {
  const server = new McpServer({
    name: "legal-rag-assistant",
    version: "0.1.0",
  });

  registerHealthCheckTool(server, service);
  registerAskLegalQuestionTool(server, service);
  registerSearchPassagesTool(server, service);
  registerIngestDocumentTool(server, service);
  registerListDocumentsTool(server, service);

  return server;
}

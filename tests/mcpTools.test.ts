import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, describe, expect, it } from "vitest";
import { assembleApplication } from "../src/app.js";
import { InMemoryVectorIndex } from "../src/infra/store/inMemoryVectorIndex.js";
import { createMcpServer } from "../src/mcpServer.js";
import {
  KeywordEmbeddingModel,
  ScriptedGenerationModel,
  silentLogger,
  testConfig,
  VOCABULARY,
} from "./helpers/fakes.js";

const clients: Client[] = [];

async function connect(): Promise<Client> {
  const app = assembleApplication(
    testConfig(),
    new InMemoryVectorIndex(VOCABULARY.length),
    { embedding: new KeywordEmbeddingModel(), generation: new ScriptedGenerationModel() },
    silentLogger,
  );
  const server = createMcpServer(app.service);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: "legal-rag-test", version: "0.0.0" });

  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  clients.push(client);
  return client;
}

async function callJson(client: Client, name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (!first || first.type !== "text") {
    throw new Error(`Tool ${name} returned no text content.`);
  }
  return JSON.parse(first.text);
}

describe("MCP tools", () => {
  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.close()));
  });

  it("registers the legal tool set", async () => {
    const client = await connect();

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "ask_legal_question",
      "health_check",
      "ingest_document",
      "list_documents",
      "search_passages",
    ]);
  });

  it("ingests, lists, searches and answers", async () => {
    const client = await connect();

    const ingested = await callJson(client, "ingest_document", {
      title: "Rent Act",
      content: "The tenant must pay the deposit to the landlord before moving in.",
      source_type: "statute",
    });
    expect(ingested).toMatchObject({ status: "ok", chunk_count: 1 });

    expect(await callJson(client, "list_documents")).toMatchObject({
      documents: [{ metadata: { title: "Rent Act", sourceType: "statute" }, chunkCount: 1 }],
    });

    expect(await callJson(client, "search_passages", { query: "tenant deposit" })).toMatchObject({
      query: "tenant deposit",
      hits: [{ title: "Rent Act", section: null, snippet: "The tenant must pay the deposit to the landlord before moving in." }],
    });

    expect(await callJson(client, "ask_legal_question", { question: "Who gets the deposit?" })).toMatchObject({
      answer: "The tenant pays the deposit to the landlord [1].",
      sources: [{ metadata: { title: "Rent Act" } }],
    });
  });

  it("reports ingestion errors as tool errors", async () => {
    const client = await connect();

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: "ingest_document", arguments: { title: "Missing content" } }),
    );

    expect(result.isError).toBe(true);
  });

  it("reports health", async () => {
    const client = await connect();

    expect(await callJson(client, "health_check")).toEqual({
      status: "healthy",
      checks: { vector_index: "ok", embedding_gateway: "ok" },
    });
  });
});

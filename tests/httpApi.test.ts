import { afterEach, describe, expect, it } from "vitest";
import { assembleApplication } from "../src/app.js";
import { createHttpApi, listen } from "../src/http/httpApi.js";
import { EmbeddingModel } from "../src/infra/ai/types.js";
import { InMemoryVectorIndex } from "../src/infra/store/inMemoryVectorIndex.js";
import { APOLOGY_RESPONSE } from "../src/services/legalQaService.js";
import {
  KeywordEmbeddingModel,
  ScriptedGenerationModel,
  silentLogger,
  testConfig,
  UnavailableEmbeddingModel,
  VOCABULARY,
} from "./helpers/fakes.js";

const RENT_ACT = "The tenant must pay the deposit to the landlord before moving in.";
const stops: Array<() => Promise<void>> = [];

async function startApi(options: { embedding?: EmbeddingModel; maxUploadBytes?: number } = {}) {
  const app = assembleApplication(
    testConfig(),
    new InMemoryVectorIndex(VOCABULARY.length),
    { embedding: options.embedding ?? new KeywordEmbeddingModel(), generation: new ScriptedGenerationModel() },
    silentLogger,
  );
  const server = createHttpApi(
    app.service,
    app.monitoring,
    { maxUploadBytes: options.maxUploadBytes ?? 1_000_000 },
    silentLogger,
  );
  stops.push(await listen(server, "127.0.0.1", 0));

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server did not bind to a TCP port.");
  }
  return `http://127.0.0.1:${address.port}`;
}

/** Returns vectors of the wrong width for the test index. */
class NarrowEmbeddingModel implements EmbeddingModel {
  readonly name = "fake:narrow";

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map(() => [1, 0, 0]);
  }

  async ping(): Promise<void> {}
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("HTTP API", () => {
  afterEach(async () => {
    while (stops.length > 0) {
      const stop = stops.pop();
      if (stop) {
        await stop();
      }
    }
  });

  it("reports healthy dependencies", async () => {
    const baseUrl = await startApi();

    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: "healthy",
      checks: { vector_index: "ok", embedding_gateway: "ok" },
    });
  });

  it("rejects malformed chat bodies with 400", async () => {
    const baseUrl = await startApi();

    const missing = await postJson(`${baseUrl}/chat`, { history: [] });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ error: "message: Required" });

    const broken = await fetch(`${baseUrl}/chat`, { method: "POST", body: "{" });
    expect(broken.status).toBe(400);
    expect(await broken.json()).toEqual({ error: "Invalid JSON body" });
  });

  it("answers with zero confidence against an empty index", async () => {
    const baseUrl = await startApi();

    const response = await postJson(`${baseUrl}/chat`, { message: "What deposit does a tenant pay?" });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ confidence: 0, sources: [] });
  });

  it("ingests JSON documents and serves them back", async () => {
    const baseUrl = await startApi();

    const ingest = await postJson(`${baseUrl}/ingest`, {
      title: "Rent Act",
      content: RENT_ACT,
      source_type: "statute",
    });
    expect(ingest.status).toBe(200);
    const ingested = (await ingest.json()) as { status: string; document_id: string; chunk_count: number };
    expect(ingested.status).toBe("ok");
    expect(ingested.chunk_count).toBe(1);
    const documentUrl = `${baseUrl}/documents/${ingested.document_id}`;

    const listed = (await (await fetch(`${baseUrl}/documents`)).json()) as {
      documents: Array<{ id: string; metadata: { title: string; sourceType: string } }>;
    };
    expect(listed.documents.map((doc) => [doc.id, doc.metadata.title, doc.metadata.sourceType])).toEqual([
      [ingested.document_id, "Rent Act", "statute"],
    ]);

    const document = await fetch(documentUrl);
    expect(await document.json()).toMatchObject({ id: ingested.document_id, text: RENT_ACT, chunk_count: 1 });

    const chat = (await (await postJson(`${baseUrl}/chat`, { message: "Who gets the deposit?" })).json()) as {
      sources: Array<{ id: string }>;
    };
    expect(chat.sources.map((source) => source.id)).toEqual([ingested.document_id]);

    const removed = await fetch(documentUrl, { method: "DELETE" });
    expect(await removed.json()).toEqual({
      status: "ok",
      document_id: ingested.document_id,
      removed_chunks: 1,
    });
    expect((await fetch(documentUrl)).status).toBe(404);
  });

  it("accepts multipart uploads", async () => {
    const baseUrl = await startApi();
    const form = new FormData();
    form.append("file", new Blob([RENT_ACT], { type: "text/plain" }), "rent_act.txt");
    form.append("source_type", "statute");

    const response = await fetch(`${baseUrl}/ingest`, { method: "POST", body: form });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: "ok", chunk_count: 1 });
    const listed = (await (await fetch(`${baseUrl}/documents`)).json()) as {
      documents: Array<{ metadata: { title: string; sourceType: string } }>;
    };
    expect(listed.documents.map((doc) => doc.metadata)).toMatchObject([
      { title: "rent act", sourceType: "statute" },
    ]);
  });

  it("rejects unsupported uploads and empty documents with 400", async () => {
    const baseUrl = await startApi();
    const form = new FormData();
    form.append("file", new Blob(["binary"]), "contract.docx");

    const unsupported = await fetch(`${baseUrl}/ingest`, { method: "POST", body: form });
    expect(unsupported.status).toBe(400);
    expect(await unsupported.json()).toEqual({
      status: "error",
      document_id: null,
      error: "Unsupported extension: .docx. Allowed: .md, .txt, .pdf",
    });

    const empty = await postJson(`${baseUrl}/ingest`, { title: "Blank", content: "   " });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toMatchObject({ status: "error", document_id: null });
  });

  it("keeps the ingest response shape when vectors do not fit the index", async () => {
    const baseUrl = await startApi({ embedding: new NarrowEmbeddingModel() });

    const response = await postJson(`${baseUrl}/ingest`, { title: "Rent Act", content: RENT_ACT });

    expect(response.status).toBe(500);
    const body: unknown = await response.json();
    expect(body).toMatchObject({
      status: "error",
      document_id: null,
      error: expect.stringContaining("Vector dimension 3 does not match index dimension 8"),
    });
    expect(await (await fetch(`${baseUrl}/documents`)).json()).toEqual({ documents: [] });
  });

  it("asks for a file field on multipart uploads without one", async () => {
    const baseUrl = await startApi();
    const form = new FormData();
    form.append("title", "Rent Act");

    const response = await fetch(`${baseUrl}/ingest`, { method: "POST", body: form });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      status: "error",
      document_id: null,
      error: "Multipart upload requires a `file` field (.md, .txt, .pdf).",
    });
  });

  it("rejects oversized uploads with 413", async () => {
    const baseUrl = await startApi({ maxUploadBytes: 64 });

    const response = await postJson(`${baseUrl}/ingest`, { title: "Rent Act", content: RENT_ACT.repeat(4) });

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({
      status: "error",
      document_id: null,
      error: "Request body exceeds 64 bytes.",
    });
  });

  it("degrades instead of failing when embeddings are down", async () => {
    const baseUrl = await startApi({ embedding: new UnavailableEmbeddingModel() });

    const ingest = await postJson(`${baseUrl}/ingest`, { title: "Rent Act", content: RENT_ACT });
    expect(ingest.status).toBe(503);
    expect(await ingest.json()).toMatchObject({ status: "error", document_id: null });

    const chat = await postJson(`${baseUrl}/chat`, { message: "What deposit does a tenant pay?" });
    expect(chat.status).toBe(200);
    expect(await chat.json()).toEqual({ response: APOLOGY_RESPONSE, confidence: 0, sources: [] });

    const health = await fetch(`${baseUrl}/health`);
    expect(health.status).toBe(503);
    expect(await health.json()).toEqual({
      status: "error",
      checks: { vector_index: "ok", embedding_gateway: "error" },
    });
  });

  it("counts handled requests in metrics", async () => {
    const baseUrl = await startApi();
    await postJson(`${baseUrl}/chat`, { message: "What deposit does a tenant pay?" });
    await postJson(`${baseUrl}/chat`, {});

    const metrics: unknown = await (await fetch(`${baseUrl}/metrics`)).json();

    expect(metrics).toMatchObject({
      requests: 2,
      errors: 0,
      last_error: null,
      index: { documentCount: 0, entryCount: 0, dimension: VOCABULARY.length, metric: "cosine" },
    });
  });

  it("answers unknown routes with 404 and wrong methods with 405", async () => {
    const baseUrl = await startApi();

    expect((await fetch(`${baseUrl}/nope`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/chat`)).status).toBe(405);
    expect((await fetch(`${baseUrl}/documents/abc`, { method: "PUT" })).status).toBe(405);
  });

  it("rejects malformed document ids with 400", async () => {
    const baseUrl = await startApi();

    const response = await fetch(`${baseUrl}/documents/%E0%A4%A`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Malformed path segment: %E0%A4%A" });
  });
});

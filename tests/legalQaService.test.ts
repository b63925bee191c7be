import { describe, expect, it } from "vitest";
import { assembleApplication } from "../src/app.js";
import { DocumentNotFound, UnsupportedDocument } from "../src/domain/errors.js";
import { EmbeddingModel } from "../src/infra/ai/types.js";
import { InMemoryVectorIndex } from "../src/infra/store/inMemoryVectorIndex.js";
import {
  APOLOGY_RESPONSE,
  INSUFFICIENT_INFORMATION_RESPONSE,
} from "../src/services/legalQaService.js";
import {
  KeywordEmbeddingModel,
  ScriptedGenerationModel,
  silentLogger,
  testConfig,
  UnavailableEmbeddingModel,
  VOCABULARY,
} from "./helpers/fakes.js";

const RENT_ACT = "The tenant must pay the deposit to the landlord before moving in.";
const PRIVACY_ACT = "Personal privacy must be protected by every data controller.";

function createApp(
  options: { embedding?: EmbeddingModel; generation?: ScriptedGenerationModel; env?: Record<string, string> } = {},
) {
  const generation = options.generation ?? new ScriptedGenerationModel();
  const app = assembleApplication(
    testConfig(options.env),
    new InMemoryVectorIndex(VOCABULARY.length),
    { embedding: options.embedding ?? new KeywordEmbeddingModel(), generation },
    silentLogger,
  );
  return { ...app, generation };
}

describe("LegalQaService", () => {
  it("answers from general knowledge with zero confidence on an empty index", async () => {
    const { service, generation } = createApp({
      generation: new ScriptedGenerationModel("No indexed document covers this."),
    });

    const result = await service.chat({ message: "What deposit does a tenant pay?" });

    expect(result).toEqual({ response: "No indexed document covers this.", confidence: 0, sources: [] });
    expect(generation.requests[0].system).toContain("No indexed legal document matched the question.");
  });

  it("declines without calling the model when answering without context is disabled", async () => {
    const { service, generation } = createApp({ env: { ANSWER_WITHOUT_CONTEXT: "false" } });

    const result = await service.chat({ message: "What deposit does a tenant pay?" });

    expect(result).toEqual({ response: INSUFFICIENT_INFORMATION_RESPONSE, confidence: 0, sources: [] });
    expect(generation.requests).toHaveLength(0);
  });

  it("grounds answers in retrieved documents and cites them", async () => {
    const { service, generation } = createApp();
    const rent = await service.ingestText({ title: "Rent Act", content: RENT_ACT, sourceType: "statute" });
    await service.ingestText({ title: "Privacy Act", content: PRIVACY_ACT, sourceType: "statute" });

    const result = await service.chat({ message: "What deposit does a tenant pay?" });

    expect(result.response).toBe("The tenant pays the deposit to the landlord [1].");
    expect(result.sources.map((source) => [source.id, source.metadata.title])).toEqual([
      [rent.documentId, "Rent Act"],
    ]);
    // One passage of five requested: cosine 2/sqrt(6) scaled by the thin-evidence penalty.
    expect(result.confidence).toBeCloseTo((2 / Math.sqrt(6)) * 0.75, 6);
    expect(generation.requests[0].messages.at(-1)?.content).toBe(
      `Context:\n[1] Rent Act\n${RENT_ACT}\n\nQuestion: What deposit does a tenant pay?`,
    );
  });

  it("degrades to an apology when embeddings are unavailable", async () => {
    const { service } = createApp({ embedding: new UnavailableEmbeddingModel() });

    const result = await service.chat({ message: "What deposit does a tenant pay?" });

    expect(result).toEqual({ response: APOLOGY_RESPONSE, confidence: 0, sources: [] });
    const metrics = await service.metrics();
    expect(metrics.errors).toBe(1);
    expect(metrics.last_error?.code).toBe("EMBEDDING_UNAVAILABLE");
  });

  it("reconstructs and deletes stored documents", async () => {
    const { service } = createApp();
    const { documentId } = await service.ingestText({ title: "Rent Act", content: `  ${RENT_ACT}\r\n` });

    const document = await service.getDocument(documentId);
    expect(document).toMatchObject({
      id: documentId,
      chunk_count: 1,
      text: RENT_ACT,
      metadata: { title: "Rent Act", sourceType: "document" },
    });

    await expect(service.deleteDocument(documentId)).resolves.toBe(1);
    await expect(service.getDocument(documentId)).rejects.toBeInstanceOf(DocumentNotFound);
    await expect(service.deleteDocument(documentId)).rejects.toBeInstanceOf(DocumentNotFound);
    expect(await service.listDocuments()).toEqual([]);
  });

  it("titles uploads after their file name and rejects unsupported types", async () => {
    const { service } = createApp();

    const result = await service.ingestUpload({
      fileName: "rent_act-2024.md",
      data: Buffer.from(RENT_ACT, "utf-8"),
    });
    const [document] = await service.listDocuments();
    expect(document).toMatchObject({ id: result.documentId, metadata: { title: "rent act 2024" } });

    await expect(
      service.ingestUpload({ fileName: "notes.docx", data: Buffer.from("x") }),
    ).rejects.toBeInstanceOf(UnsupportedDocument);
  });

  it("filters passages by source type", async () => {
    const { service } = createApp();
    await service.ingestText({ title: "Rent Act", content: RENT_ACT, sourceType: "statute" });
    const judgment = await service.ingestText({
      title: "Tenant v Landlord",
      content: "The court held the tenant was owed the deposit.",
      sourceType: "judgment",
    });

    const hits = await service.searchPassages("tenant deposit", 5, { sourceType: "judgment" });
    expect(hits.map((hit) => hit.documentId)).toEqual([judgment.documentId]);
  });

  it("reports health of the index and the embedding model", async () => {
    const embedding = new KeywordEmbeddingModel();
    const { service } = createApp({ embedding });

    await expect(service.health()).resolves.toEqual({
      status: "healthy",
      checks: { vector_index: "ok", embedding_gateway: "ok" },
    });

    embedding.pingFails = true;
    await expect(service.health()).resolves.toEqual({
      status: "error",
      checks: { vector_index: "ok", embedding_gateway: "error" },
    });
  });
});

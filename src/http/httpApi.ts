import { createServer, IncomingMessage, Server, ServerResponse } from "node:http";
import type { Logger } from "pino";
import { z, ZodError } from "zod";
import {
  ChunkingError,
  DocumentNotFound,
  EmbeddingUnavailable,
  LegalQaError,
  UnsupportedDocument,
} from "../domain/errors.js";
import { describeError } from "../infra/ai/retry.js";
import { getSupportedDocumentExtensions } from "../infra/parsers/documentLoader.js";
import { IngestResult } from "../pipelines/ingestion.js";
import { LegalQaService } from "../services/legalQaService.js";
import { MonitoringService } from "../services/monitoringService.js";
import { childLogger } from "../utils/logger.js";

const chatSchema = z.object({
  message: z.string().trim().min(1),
  history: z
    .array(
      z.object({
        role: z.enum(["user", "assistant"]),
        content: z.string(),
      }),
    )
    .optional(),
  top_k: z.number().int().min(1).max(20).optional(),
  filter: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
});

const jsonIngestSchema = z.object({
  title: z.string().trim().min(1),
  content: z.string(),
  source_type: z.string().optional(),
});

const DOCUMENT_PATH = /^\/documents\/([^/]+)$/;

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export interface HttpApiOptions {
  maxUploadBytes: number;
}

export function createHttpApi(
  service: LegalQaService,
  monitoring: MonitoringService,
  options: HttpApiOptions,
  logger?: Logger,
): Server {
  const log = childLogger("http", logger);

  return createServer(async (req, res) => {
    const startedAt = Date.now();
    try {
      await route(req, res, service, options, log);
    } catch (error) {
      const status = error instanceof HttpError ? error.status : 500;
      if (status >= 500) {
        monitoring.trackError(error);
        log.error({ error: describeError(error), url: req.url }, "Request failed");
      }
      if (!res.headersSent) {
        writeJson(res, status, { error: status >= 500 ? "Internal server error" : describeError(error) });
      }
    } finally {
      monitoring.trackRequest(Date.now() - startedAt);
      log.debug(
        { method: req.method, url: req.url, status: res.statusCode, ms: Date.now() - startedAt },
        "Handled request",
      );
    }
  });
}

export async function listen(
  server: Server,
  host: string,
  port: number,
): Promise<() => Promise<void>> {
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  return async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };
}

async function route(
  req: IncomingMessage,
  res: ServerResponse,
  service: LegalQaService,
  options: HttpApiOptions,
  log: Logger,
): Promise<void> {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const method = req.method ?? "GET";

  if (url.pathname === "/chat") {
    assertMethod(method, "POST");
    const parsed = chatSchema.safeParse(await readJsonBody(req, options.maxUploadBytes));
    if (!parsed.success) {
      throw new HttpError(400, formatZodError(parsed.error));
    }
    const result = await service.chat({
      message: parsed.data.message,
      history: parsed.data.history,
      topK: parsed.data.top_k,
      filter: parsed.data.filter,
    });
    writeJson(res, 200, result);
    return;
  }

  if (url.pathname === "/ingest") {
    assertMethod(method, "POST");
    await handleIngest(req, res, service, options, log);
    return;
  }

  if (url.pathname === "/health") {
    assertMethod(method, "GET");
    const report = await service.health();
    writeJson(res, report.status === "healthy" ? 200 : 503, report);
    return;
  }

  if (url.pathname === "/metrics") {
    assertMethod(method, "GET");
    writeJson(res, 200, await service.metrics());
    return;
  }

  if (url.pathname === "/documents") {
    assertMethod(method, "GET");
    writeJson(res, 200, { documents: await service.listDocuments() });
    return;
  }

  const documentMatch = DOCUMENT_PATH.exec(url.pathname);
  if (documentMatch?.[1]) {
    const documentId = decodePathSegment(documentMatch[1]);
    try {
      if (method === "GET") {
        writeJson(res, 200, await service.getDocument(documentId));
        return;
      }
      if (method === "DELETE") {
        const removed = await service.deleteDocument(documentId);
        writeJson(res, 200, { status: "ok", document_id: documentId, removed_chunks: removed });
        return;
      }
    } catch (error) {
      if (error instanceof DocumentNotFound) {
        throw new HttpError(404, error.message);
      }
      throw error;
    }
    throw new HttpError(405, "Method not allowed");
  }

  throw new HttpError(404, "Not found");
}

async function handleIngest(
  req: IncomingMessage,
  res: ServerResponse,
  service: LegalQaService,
  options: HttpApiOptions,
  log: Logger,
): Promise<void> {
  let result: IngestResult;
  try {
    result = await ingestFromRequest(req, service, options);
  } catch (error) {
    // The service has already counted failures that reached it.
    const status = ingestErrorStatus(error);
    if (status >= 500) {
      log.error({ error: describeError(error) }, "Ingestion failed");
    }
    const exposed = error instanceof HttpError || error instanceof LegalQaError;
    writeJson(res, status, {
      status: "error",
      document_id: null,
      error: exposed ? describeError(error) : "Internal server error",
    });
    return;
  }

  writeJson(res, 200, {
    status: "ok",
    document_id: result.documentId,
    chunk_count: result.chunkCount,
  });
}

async function ingestFromRequest(
  req: IncomingMessage,
  service: LegalQaService,
  options: HttpApiOptions,
): Promise<IngestResult> {
  const contentType = req.headers["content-type"] ?? "";
  const body = await readBody(req, options.maxUploadBytes);

  if (contentType.startsWith("multipart/form-data")) {
    const form = await parseMultipart(body, contentType);
    const file = form.get("file");
    if (!file || typeof file === "string") {
      throw new HttpError(
        400,
        `Multipart upload requires a \`file\` field (${getSupportedDocumentExtensions().join(", ")}).`,
      );
    }
    const title = form.get("title");
    const sourceType = form.get("source_type");

    return service.ingestUpload({
      fileName: file.name,
      data: Buffer.from(await file.arrayBuffer()),
      title: typeof title === "string" ? title : undefined,
      sourceType: typeof sourceType === "string" ? sourceType : undefined,
    });
  }

  const parsed = jsonIngestSchema.safeParse(parseJson(body));
  if (!parsed.success) {
    throw new HttpError(400, formatZodError(parsed.error));
  }
  return service.ingestText({
    title: parsed.data.title,
    content: parsed.data.content,
    sourceType: parsed.data.source_type,
  });
}

async function parseMultipart(body: Buffer, contentType: string): Promise<FormData> {
  try {
    return await new Request("http://localhost/ingest", {
      method: "POST",
      headers: { "content-type": contentType },
      body,
    }).formData();
  } catch (error) {
    throw new HttpError(400, `Malformed multipart body: ${describeError(error)}`);
  }
}

function ingestErrorStatus(error: unknown): number {
  if (error instanceof HttpError) {
    return error.status;
  }
  if (error instanceof ChunkingError || error instanceof UnsupportedDocument) {
    return 400;
  }
  if (error instanceof EmbeddingUnavailable) {
    return 503;
  }
  return 500;
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new HttpError(400, `Malformed path segment: ${segment}`);
  }
}

function assertMethod(actual: string, expected: string): void {
  if (actual !== expected) {
    throw new HttpError(405, "Method not allowed");
  }
}

function readBody(req: IncomingMessage, maxBytes: number): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;

    // Bytes past the limit are drained and dropped.
    req.on("data", (chunk: Buffer) => {
      total += chunk.length;
      if (total <= maxBytes) {
        chunks.push(chunk);
      }
    });
    req.on("end", () => {
      if (total > maxBytes) {
        reject(new HttpError(413, `Request body exceeds ${maxBytes} bytes.`));
        return;
      }
      resolve(Buffer.concat(chunks));
    });
    req.on("error", reject);
  });
}

async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  return parseJson(await readBody(req, maxBytes));
}

function parseJson(body: Buffer): unknown {
  const raw = body.toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(400, "Invalid JSON body");
  }
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
    .join("; ");
}

function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

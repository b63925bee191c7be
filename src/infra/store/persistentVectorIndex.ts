import { promises as fs } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { IndexEntry, SimilarityMetric } from "../../domain/types.js";
import { childLogger } from "../../utils/logger.js";
import {
  InMemoryVectorIndex,
  InMemoryVectorIndexSnapshot,
  StoredEntry,
} from "./inMemoryVectorIndex.js";

// Version 2 stores each vector as base64 little-endian float32; version 1 as a JSON array.
const CURRENT_FORMAT_VERSION = 2;
const READABLE_FORMAT_VERSIONS = [1, CURRENT_FORMAT_VERSION];
const FLOAT32_BYTES = 4;

interface PersistedEntry extends Omit<StoredEntry, "vector"> {
  vector: string | number[];
}

interface PersistedSnapshot extends Omit<InMemoryVectorIndexSnapshot, "entries"> {
  entries: PersistedEntry[];
}

interface PersistedVectorIndex {
  format_version: number;
  saved_at: string;
  snapshot: PersistedSnapshot;
}

export interface PersistentVectorIndexOptions {
  maxBytes: number;
  logger?: Logger;
}

/**
 * In-memory index mirrored to a JSON file after every write. Writes are
 * serialized through a promise chain; if the file cannot be written the
 * in-memory state is rolled back to the previous snapshot.
 */
export class PersistentVectorIndex extends InMemoryVectorIndex {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  private readonly logger: Logger;

  constructor(
    filePath: string,
    dimension: number,
    metric: SimilarityMetric,
    private readonly options: PersistentVectorIndexOptions,
  ) {
    super(dimension, metric);
    this.absolutePath = path.resolve(filePath);
    this.logger = childLogger("persistent-index", options.logger);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.absolutePath, "utf-8");
      this.importSnapshot(parseSnapshotFromDisk(JSON.parse(raw)));
      const stats = await super.stats();
      this.logger.info(
        { path: this.absolutePath, documents: stats.documentCount, entries: stats.entryCount },
        "Loaded vector index from disk",
      );
    } catch (error) {
      if (!isFileMissing(error)) {
        throw error;
      }
    }

    this.initialized = true;
  }

  async upsert(entries: IndexEntry[]): Promise<void> {
    await this.initialize();
    await this.mutateAndPersist(() => super.upsert(entries));
  }

  async delete(documentId: string): Promise<number> {
    await this.initialize();
    let removed = 0;
    await this.mutateAndPersist(async () => {
      removed = await super.delete(documentId);
    });
    return removed;
  }

  async ping(): Promise<void> {
    await this.initialize();
    await fs.access(path.dirname(this.absolutePath));
  }

  async close(): Promise<void> {
    await this.initialize();
    await this.enqueueWrite(async () => {
      await this.persistNow();
    });
  }

  private async mutateAndPersist(mutation: () => Promise<void>): Promise<void> {
    await this.enqueueWrite(async () => {
      const previous = this.segments;
      await mutation();
      try {
        await this.persistNow();
      } catch (error) {
        this.segments = previous;
        throw error;
      }
    });
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }

  private async persistNow(): Promise<void> {
    const snapshot = this.exportSnapshot();
    const payload: PersistedVectorIndex = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: {
        ...snapshot,
        entries: snapshot.entries.map((entry) => ({ ...entry, vector: encodeVector(entry.vector) })),
      },
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new Error(
        `Vector index snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await fs.rename(tempPath, this.absolutePath);
  }
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function parseSnapshotFromDisk(raw: unknown): InMemoryVectorIndexSnapshot {
  if (!raw || typeof raw !== "object" || !("snapshot" in raw)) {
    throw new Error("Invalid vector index file format.");
  }
  const version = "format_version" in raw ? raw.format_version : undefined;
  if (typeof version !== "number" || !READABLE_FORMAT_VERSIONS.includes(version)) {
    throw new Error(
      `Unsupported vector index format version: ${String(version)}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }
  if (!isValidSnapshot(raw.snapshot)) {
    throw new Error("Invalid vector index snapshot.");
  }
  return {
    ...raw.snapshot,
    entries: raw.snapshot.entries.map((entry) => ({
      ...entry,
      vector: typeof entry.vector === "string" ? decodeVector(entry.vector) : entry.vector,
    })),
  };
}

export function encodeVector(vector: number[]): string {
  const buffer = Buffer.alloc(vector.length * FLOAT32_BYTES);
  vector.forEach((value, i) => buffer.writeFloatLE(value, i * FLOAT32_BYTES));
  return buffer.toString("base64");
}

export function decodeVector(encoded: string): number[] {
  const buffer = Buffer.from(encoded, "base64");
  if (buffer.length % FLOAT32_BYTES !== 0) {
    throw new Error("Invalid vector index snapshot: truncated vector.");
  }
  const vector: number[] = [];
  for (let offset = 0; offset < buffer.length; offset += FLOAT32_BYTES) {
    vector.push(buffer.readFloatLE(offset));
  }
  return vector;
}

function isValidSnapshot(value: unknown): value is PersistedSnapshot {
  if (!value || typeof value !== "object") {
    return false;
  }
  return (
    "dimension" in value &&
    typeof value.dimension === "number" &&
    "metric" in value &&
    (value.metric === "cosine" || value.metric === "inner_product") &&
    "nextSeq" in value &&
    typeof value.nextSeq === "number" &&
    "entries" in value &&
    Array.isArray(value.entries) &&
    value.entries.every(isStoredEntry)
  );
}

function isStoredEntry(value: unknown): value is PersistedEntry {
  if (!value || typeof value !== "object") {
    return false;
  }
  return (
    "seq" in value &&
    typeof value.seq === "number" &&
    "chunkId" in value &&
    typeof value.chunkId === "string" &&
    "documentId" in value &&
    typeof value.documentId === "string" &&
    "text" in value &&
    typeof value.text === "string" &&
    "vector" in value &&
    (typeof value.vector === "string" || Array.isArray(value.vector)) &&
    "metadata" in value &&
    typeof value.metadata === "object" &&
    value.metadata !== null
  );
}

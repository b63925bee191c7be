import { execFile } from "node:child_process";
import { promises as fs } from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import { UnsupportedDocument } from "../../domain/errors.js";
import { describeError } from "../ai/retry.js";
import { childLogger } from "../../utils/logger.js";
import { normalizeText } from "../../utils/text.js";

const runCommand = promisify(execFile);
// Keeps the optional pdf-parse import out of the compiler's module graph.
const importOptional = new Function(
  "specifier",
  "return import(specifier)",
) as (specifier: string) => Promise<unknown>;

const TEXT_EXTENSIONS = [".md", ".txt"];
const PDF_EXTENSION = ".pdf";
const ALLOWED_EXTENSIONS = [...TEXT_EXTENSIONS, PDF_EXTENSION];

type PdfExtractor = (data: Buffer) => Promise<string>;

export interface LoadedDocument {
  title: string;
  sourceType: string;
  text: string;
}

export function isSupportedDocumentExtension(fileName: string): boolean {
  return ALLOWED_EXTENSIONS.includes(extensionOf(fileName));
}

export function getSupportedDocumentExtensions(): string[] {
  return [...ALLOWED_EXTENSIONS];
}

/** Document title derived from a file name: extension dropped, separators spaced. */
export function titleFromFileName(fileName: string): string {
  const base = path.basename(fileName, path.extname(fileName));
  return base.replace(/[_-]+/g, " ").replace(/\s+/g, " ").trim() || base;
}

export async function loadDocumentFile(
  filePath: string,
  sourceType = "document",
): Promise<LoadedDocument> {
  const extension = requireSupportedExtension(filePath);
  const data = await fs.readFile(filePath);
  const text =
    extension === PDF_EXTENSION ? await extractPdfText(data, filePath) : decodeText(data);

  return { title: titleFromFileName(filePath), sourceType, text };
}

export async function loadDocumentTextFromBuffer(
  fileName: string,
  data: Buffer,
): Promise<string> {
  const extension = requireSupportedExtension(fileName);
  return extension === PDF_EXTENSION ? extractPdfText(data) : decodeText(data);
}

function extensionOf(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

function requireSupportedExtension(fileName: string): string {
  const extension = extensionOf(fileName);
  if (!ALLOWED_EXTENSIONS.includes(extension)) {
    throw new UnsupportedDocument(
      `Unsupported extension: ${extension || "(none)"}. Allowed: ${ALLOWED_EXTENSIONS.join(", ")}`,
    );
  }
  return extension;
}

function decodeText(data: Buffer): string {
  return normalizeText(data.toString("utf-8"));
}

/**
 * PDF text comes from pdf-parse when it is installed, then from the
 * `pdftotext` binary for files on disk.
 */
async function extractPdfText(data: Buffer, filePath?: string): Promise<string> {
  const extractor = await loadPdfExtractor();
  if (extractor) {
    const text = normalizeText(await extractor(data));
    if (text) {
      return text;
    }
  }

  if (filePath) {
    const text = await runPdftotext(filePath);
    if (text) {
      return text;
    }
  }

  throw new UnsupportedDocument(
    "PDF text extraction is unavailable. Install `pdf-parse` or poppler's `pdftotext`.",
  );
}

async function loadPdfExtractor(): Promise<PdfExtractor | null> {
  let mod: unknown;
  try {
    mod = await importOptional("pdf-parse");
  } catch (error) {
    childLogger("document-loader").debug({ error: describeError(error) }, "pdf-parse is not installed");
    return null;
  }
  return toPdfExtractor(mod);
}

// pdf-parse 1.x exports a function; 2.x exports a PDFParse class.
function toPdfExtractor(mod: unknown): PdfExtractor | null {
  const fn = typeof mod === "function" ? mod : pick(mod, "default");
  if (typeof fn === "function") {
    const parse = fn as (data: Buffer) => Promise<{ text?: string }>;
    return async (data) => (await parse(data)).text ?? "";
  }

  const ctor = pick(mod, "PDFParse");
  if (typeof ctor !== "function") {
    return null;
  }
  const PdfParser = ctor as new (input: { data: Buffer }) => {
    getText(): Promise<{ text?: string }>;
    destroy?(): Promise<void> | void;
  };
  return async (data) => {
    const parser = new PdfParser({ data });
    try {
      return (await parser.getText()).text ?? "";
    } finally {
      await parser.destroy?.();
    }
  };
}

function pick(mod: unknown, key: string): unknown {
  if (!mod || typeof mod !== "object" || !(key in mod)) {
    return undefined;
  }
  return Reflect.get(mod, key);
}

async function runPdftotext(filePath: string): Promise<string> {
  try {
    const { stdout } = await runCommand("pdftotext", ["-layout", filePath, "-"]);
    return normalizeText(stdout);
  } catch (error) {
    childLogger("document-loader").debug(
      { error: describeError(error), filePath },
      "pdftotext is unavailable",
    );
    return "";
  }
}

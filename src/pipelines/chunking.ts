import { ChunkingError } from "../domain/errors.js";
import { Chunk } from "../domain/types.js";
import { findSectionHeadings, lastSentenceEnd, SectionHeading } from "../utils/text.js";

const DEFAULT_CHUNK_SIZE = 1000;
const DEFAULT_OVERLAP = 200;
const DEFAULT_BOUNDARY_TOLERANCE = 0.45;

export interface ChunkingOptions {
  chunkSize?: number;
  overlap?: number;
  /**
   * Fraction of `chunkSize` at the end of each span searched for a natural
   * boundary. Outside this window the chunk is hard-truncated.
   */
  boundaryTolerance?: number;
}

export function chunkDocument(
  documentId: string,
  text: string,
  options: ChunkingOptions = {},
): Chunk[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.overlap ?? DEFAULT_OVERLAP;
  const tolerance = options.boundaryTolerance ?? DEFAULT_BOUNDARY_TOLERANCE;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ChunkingError(`Chunk size must be a positive integer, got ${chunkSize}.`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ChunkingError(`Overlap must be a non-negative integer, got ${overlap}.`);
  }
  if (chunkSize <= overlap) {
    throw new ChunkingError(
      `Chunk size (${chunkSize}) must be larger than overlap (${overlap}).`,
    );
  }
  if (!text.trim()) {
    throw new ChunkingError(`Document ${documentId} has no text to chunk.`);
  }

  const spans = splitSpans(text, chunkSize, overlap, tolerance);
  const headings = findSectionHeadings(text);

  return spans.map(([start, end], ordinal) => ({
    id: `${documentId}:${ordinal}`,
    documentId,
    ordinal,
    text: text.slice(start, end),
    start,
    end,
    section: sectionAt(headings, start),
  }));
}

/**
 * Inverse of chunking: drops the overlapping prefix of every chunk after the
 * first and concatenates the rest.
 */
export function reconstructText(chunks: Array<Pick<Chunk, "text" | "start" | "end">>): string {
  const ordered = [...chunks].sort((a, b) => a.start - b.start);
  let text = "";
  let covered = 0;

  for (const chunk of ordered) {
    const skip = Math.max(0, covered - chunk.start);
    text += chunk.text.slice(skip);
    covered = Math.max(covered, chunk.end);
  }

  return text;
}

function splitSpans(
  text: string,
  chunkSize: number,
  overlap: number,
  tolerance: number,
): Array<[number, number]> {
  const spans: Array<[number, number]> = [];
  const minBoundary = Math.max(overlap + 1, Math.ceil(chunkSize * (1 - tolerance)));
  let start = 0;

  while (start < text.length) {
    const hardEnd = Math.min(start + chunkSize, text.length);
    let end = hardEnd;

    if (hardEnd < text.length) {
      const boundary = findBoundary(
        text.slice(start, hardEnd),
        text.charAt(hardEnd),
        minBoundary,
      );
      if (boundary > 0) {
        end = start + boundary;
      }
    }

    spans.push([start, end]);
    if (end >= text.length) {
      break;
    }
    start = end - overlap;
  }

  return spans;
}

/**
 * Returns the length of the preferred prefix of `window`, or -1 when no
 * boundary at or past `minLength` exists. Paragraph breaks win over sentence
 * ends, which win over plain whitespace.
 */
function findBoundary(window: string, lookahead: string, minLength: number): number {
  const paragraph = window.lastIndexOf("\n\n");
  if (paragraph >= 0 && paragraph + 2 >= minLength) {
    return paragraph + 2;
  }

  // The character after the window decides whether a trailing "." ends a sentence.
  const sentence = lastSentenceEnd(window + lookahead, false);
  if (sentence >= minLength) {
    return sentence;
  }

  const whitespace = Math.max(window.lastIndexOf(" "), window.lastIndexOf("\n"));
  if (whitespace >= 0 && whitespace + 1 >= minLength) {
    return whitespace + 1;
  }

  return -1;
}

function sectionAt(headings: SectionHeading[], offset: number): string | null {
  let current: string | null = null;
  for (const heading of headings) {
    if (heading.offset > offset) {
      break;
    }
    current = heading.title;
  }
  return current;
}

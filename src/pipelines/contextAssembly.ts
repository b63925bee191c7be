import { SearchHit, SourceDocument } from "../domain/types.js";
import { truncateToSentences } from "../utils/text.js";

const BLOCK_SEPARATOR = "\n\n";

export interface ContextPassage {
  hit: SearchHit;
  truncated: boolean;
}

export interface AssembledContext {
  text: string;
  passages: ContextPassage[];
  documents: SourceDocument[];
}

export interface ContextAssemblyOptions {
  budget: number;
}

/**
 * Packs ranked passages into a numbered context block no longer than
 * `budget` characters. The first passage that does not fit is cut at a
 * sentence boundary where possible and ends the assembly.
 */
export function assembleContext(
  passages: SearchHit[],
  { budget }: ContextAssemblyOptions,
): AssembledContext {
  const blocks: string[] = [];
  const used: ContextPassage[] = [];
  let length = 0;

  for (const hit of passages) {
    const separator = blocks.length > 0 ? BLOCK_SEPARATOR.length : 0;
    const header = formatHeader(used.length + 1, hit);
    const full = `${header}\n${hit.text}`;

    if (length + separator + full.length <= budget) {
      blocks.push(full);
      used.push({ hit, truncated: false });
      length += separator + full.length;
      continue;
    }

    const room = budget - length - separator - header.length - 1;
    const text = truncateToSentences(hit.text, room);
    if (text.length > 0) {
      blocks.push(`${header}\n${text}`);
      used.push({ hit, truncated: true });
    }
    break;
  }

  return {
    text: blocks.join(BLOCK_SEPARATOR),
    passages: used,
    documents: distinctDocuments(used),
  };
}

function formatHeader(position: number, hit: SearchHit): string {
  const section = hit.metadata.section ? ` — ${hit.metadata.section}` : "";
  return `[${position}] ${hit.metadata.title}${section}`;
}

function distinctDocuments(passages: ContextPassage[]): SourceDocument[] {
  const seen = new Set<string>();
  const documents: SourceDocument[] = [];

  for (const { hit } of passages) {
    if (seen.has(hit.documentId)) {
      continue;
    }
    seen.add(hit.documentId);
    documents.push({
      id: hit.documentId,
      metadata: {
        title: hit.metadata.title,
        sourceType: hit.metadata.sourceType,
        ingestedAt: hit.metadata.ingestedAt,
      },
    });
  }

  return documents;
}

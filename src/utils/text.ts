const LEGAL_HEADING_REGEX =
  /^(?:article|section|chapter|part|schedule|rule|clause|order)\s+[0-9IVXLCDM]+[A-Z]?\b/i;
const ALL_CAPS_HEADING_REGEX = /^[A-Z][A-Z0-9 ,.'()&-]{3,79}$/;
const SENTENCE_END_REGEX = /[.!?;]["')\]]?(?=\s)/g;
const MAX_HEADING_LENGTH = 120;

export interface SectionHeading {
  offset: number;
  title: string;
}

export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(/\t/g, " ").trim();
}

export function isSectionHeading(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed || trimmed.length > MAX_HEADING_LENGTH) {
    return false;
  }
  if (/^#{1,6}\s+\S/.test(trimmed)) {
    return true;
  }
  if (LEGAL_HEADING_REGEX.test(trimmed)) {
    return true;
  }
  return ALL_CAPS_HEADING_REGEX.test(trimmed) && /[A-Z]{3,}/.test(trimmed);
}

export function cleanHeading(line: string): string {
  return line
    .trim()
    .replace(/^#{1,6}\s+/, "")
    .replace(/[:.\s]+$/, "")
    .trim();
}

export function findSectionHeadings(text: string): SectionHeading[] {
  const headings: SectionHeading[] = [];
  let offset = 0;

  for (const line of text.split("\n")) {
    if (isSectionHeading(line)) {
      headings.push({ offset: offset + (line.length - line.trimStart().length), title: cleanHeading(line) });
    }
    offset += line.length + 1;
  }

  return headings;
}

/**
 * Index just past the last sentence terminator in `text`, or -1.
 * A terminator only counts when whitespace follows it, or when it closes
 * `text` and `closesAtEnd` is set.
 */
export function lastSentenceEnd(text: string, closesAtEnd = true): number {
  let last = -1;
  for (const match of text.matchAll(SENTENCE_END_REGEX)) {
    last = (match.index ?? 0) + match[0].length;
  }
  if (closesAtEnd && /[.!?;]["')\]]?$/.test(text)) {
    last = text.length;
  }
  return last;
}

export function truncateToSentences(text: string, maxChars: number): string {
  if (maxChars <= 0) {
    return "";
  }
  if (text.length <= maxChars) {
    return text;
  }

  const window = text.slice(0, maxChars);
  const end = lastSentenceEnd(window);
  if (end > 0) {
    return window.slice(0, end).trimEnd();
  }
  return window.trimEnd();
}

export function summarizeSnippet(text: string, maxChars = 240): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  if (collapsed.length <= maxChars) {
    return collapsed;
  }
  return `${collapsed.slice(0, maxChars - 3)}...`;
}

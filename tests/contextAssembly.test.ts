import { describe, expect, it } from "vitest";
import { SearchHit } from "../src/domain/types.js";
import { assembleContext } from "../src/pipelines/contextAssembly.js";
import { makeEntry } from "./helpers/fakes.js";

function passage(
  documentId: string,
  ordinal: number,
  text: string,
  title: string,
  section: string | null = null,
  score = 0.8,
): SearchHit {
  const { vector: _vector, ...entry } = makeEntry(documentId, ordinal, [], { text, title, section });
  return { ...entry, score };
}

describe("assembleContext", () => {
  it("numbers passages and labels them with title and section", () => {
    const context = assembleContext(
      [
        passage("rent", 0, "The tenant shall pay rent.", "Rent Act", "Section 4"),
        passage("privacy", 0, "Data must be protected.", "Privacy Act"),
      ],
      { budget: 1000 },
    );

    expect(context.text).toBe(
      "[1] Rent Act — Section 4\nThe tenant shall pay rent.\n\n[2] Privacy Act\nData must be protected.",
    );
    expect(context.passages.map((item) => item.truncated)).toEqual([false, false]);
    expect(context.documents.map((doc) => doc.id)).toEqual(["rent", "privacy"]);
  });

  it("lists each contributing document once in rank order", () => {
    const context = assembleContext(
      [
        passage("rent", 0, "First clause.", "Rent Act"),
        passage("privacy", 0, "Second clause.", "Privacy Act"),
        passage("rent", 1, "Third clause.", "Rent Act"),
      ],
      { budget: 1000 },
    );

    expect(context.passages).toHaveLength(3);
    expect(context.documents).toEqual([
      {
        id: "rent",
        metadata: { title: "Rent Act", sourceType: "statute", ingestedAt: "2024-01-01T00:00:00.000Z" },
      },
      {
        id: "privacy",
        metadata: { title: "Privacy Act", sourceType: "statute", ingestedAt: "2024-01-01T00:00:00.000Z" },
      },
    ]);
  });

  it("truncates the first passage that does not fit at a sentence end and stops", () => {
    const context = assembleContext(
      [
        passage("a", 0, "One.", "A"),
        passage("b", 0, "Alpha beta. Gamma delta epsilon.", "B"),
        passage("c", 0, "Never reached.", "C"),
      ],
      { budget: 33 },
    );

    expect(context.text).toBe("[1] A\nOne.\n\n[2] B\nAlpha beta.");
    expect(context.passages.map((item) => [item.hit.documentId, item.truncated])).toEqual([
      ["a", false],
      ["b", true],
    ]);
    expect(context.documents.map((doc) => doc.id)).toEqual(["a", "b"]);
  });

  it("never exceeds the budget", () => {
    const context = assembleContext([passage("a", 0, "One.", "A")], { budget: 8 });

    expect(context.text).toBe("[1] A\nOn");
    expect(context.text.length).toBeLessThanOrEqual(8);
    expect(context.passages[0].truncated).toBe(true);
  });

  it("drops a passage when not even its header fits", () => {
    const context = assembleContext(
      [passage("a", 0, "One.", "A"), passage("b", 0, "Two.", "B")],
      { budget: 14 },
    );

    expect(context.text).toBe("[1] A\nOne.");
    expect(context.passages).toHaveLength(1);
    expect(context.documents.map((doc) => doc.id)).toEqual(["a"]);
  });

  it("returns an empty context without passages", () => {
    expect(assembleContext([], { budget: 100 })).toEqual({ text: "", passages: [], documents: [] });
  });
});

import { describe, it, expect } from "vitest";
import { textPage } from "../testing/fixtures";
import { buildTextContext, ChunkRetriever, chunkPages, chunkText, type TextChunk } from "./contextRetriever";
import { PA_STANDARD_SCHEMA } from "./paFieldSchema";

describe("chunkText", () => {
  it("returns nothing for empty text", () => {
    expect(chunkText("", 100, 20)).toEqual([]);
  });

  it("keeps short text in one chunk", () => {
    expect(chunkText("Member ID: XYZ987", 100, 20, 3)).toEqual([
      { id: 0, text: "Member ID: XYZ987", pageNumber: 3, start: 0, end: 17 },
    ]);
  });

  it("breaks at paragraph boundaries with overlap", () => {
    const text = ["A".repeat(30), "B".repeat(30), "C".repeat(30)].join("\n\n");
    const chunks = chunkText(text, 50, 10);

    expect(chunks).toHaveLength(3);
    expect(chunks[0].text).toBe("A".repeat(30));
    expect(chunks[1].text).toBe(`${"A".repeat(8)}\n\n${"B".repeat(30)}`);
    expect(chunks[2].text).toBe(`${"B".repeat(8)}\n\n${"C".repeat(30)}`);
    expect(chunks[1].start).toBeLessThan(chunks[0].end);
  });

  it("numbers chunks across pages", () => {
    const chunks = chunkPages([textPage(1, "first page"), textPage(2, "second page")], 100, 20);
    expect(chunks.map(c => [c.id, c.pageNumber])).toEqual([[0, 1], [1, 2]]);
  });
});

describe("ChunkRetriever", () => {
  const chunks: TextChunk[] = [
    { id: 0, text: "Insurance member id ABC123", pageNumber: 1, start: 0, end: 26 },
    { id: 1, text: "Diagnosis type 2 diabetes", pageNumber: 1, start: 26, end: 51 },
    { id: 2, text: "Member services phone", pageNumber: 2, start: 0, end: 21 },
  ];
  const retriever = new ChunkRetriever(chunks);

  it("ranks chunks by share of query words", () => {
    expect(retriever.retrieve("member id", 5).map(c => c.id)).toEqual([0, 2]);
  });

  it("returns at most topK chunks without index data", () => {
    expect(retriever.retrieve("member id", 1)).toEqual([chunks[0]]);
  });

  it("returns nothing for a query without words", () => {
    expect(retriever.retrieve("?", 3)).toEqual([]);
  });
});

describe("buildTextContext", () => {
  const memberId = PA_STANDARD_SCHEMA.fields.filter(f => f.name === "member_id");

  it("returns the whole text when it fits", () => {
    const pages = [textPage(1, "Patient: Jane Doe"), textPage(2, "Member ID: XYZ987")];
    expect(buildTextContext(pages, memberId, { maxChars: 1000, chunkSize: 100, chunkOverlap: 20 }))
      .toBe("Patient: Jane Doe\n\nMember ID: XYZ987");
  });

  it("adds matching chunks after the document head when the text is too long", () => {
    const pages = [textPage(1, "Intro text filler. ".repeat(10)), textPage(2, "Member ID: XYZ987")];
    const fullText = pages.map(p => p.text).join("\n\n");

    const context = buildTextContext(pages, memberId, { maxChars: 150, chunkSize: 60, chunkOverlap: 10 });

    expect(context).toBe(`${fullText.slice(0, 75)}\n\n---\n\n[page 2] Member ID: XYZ987`);
  });
});

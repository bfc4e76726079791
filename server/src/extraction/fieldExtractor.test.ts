import { describe, it, expect } from "vitest";
import type { PageContent } from "@shared/schema";
import { ExtractionParseError, ExtractionProviderError, ProviderTimeoutError } from "../errors";
import { documentFromPages, extractionJSON, fakeLLM, textPage } from "../testing/fixtures";
import {
  DEFAULT_CONFIDENCE,
  FieldExtractionEngine,
  buildExtractionPrompt,
  parseExtractionResponse,
  type FieldExtractionOptions,
} from "./fieldExtractor";
import { PA_STANDARD_SCHEMA } from "./paFieldSchema";

const OPTIONS: FieldExtractionOptions = {
  timeoutMs: 1000,
  maxImages: 10,
  contextChars: 12000,
  chunkSize: 1000,
  chunkOverlap: 200,
};

const NOW = () => new Date("2024-03-01T12:00:00.000Z");

function scannedPage(pageNumber: number): PageContent {
  return { pageNumber, text: "", tables: [], scanned: true, image: new Uint8Array([0x89, 0x50, 0x4e, 0x47]) };
}

const REFERRAL = documentFromPages([textPage(1, "Patient: Jane Doe, DOB: 01/02/1980")]);

describe("FieldExtractionEngine", () => {
  it("extracts fields from referral text", async () => {
    const llm = fakeLLM(() => extractionJSON([
      { name: "patient_dob", value: "01/02/1980" },
      { name: "patient_name", value: "Jane Doe", confidence: 0.95 },
    ]));
    const engine = new FieldExtractionEngine(llm, OPTIONS, NOW);

    const result = await engine.extractFields(REFERRAL, PA_STANDARD_SCHEMA, false);

    expect(result.fields).toEqual([
      { name: "patient_name", value: "Jane Doe", confidence: 0.95, confidenceSource: "model" },
      { name: "patient_dob", value: "01/02/1980", confidence: DEFAULT_CONFIDENCE.text, confidenceSource: "default" },
    ]);
    expect(result.metadata).toEqual({
      provider: "openai",
      model: "fake-model",
      mode: "text",
      visionEnabled: false,
      schemaVersion: "pa-standard@1.0.0",
      extractedAt: "2024-03-01T12:00:00.000Z",
    });
  });

  it("sends the document text and the schema in one JSON request", async () => {
    const llm = fakeLLM(() => extractionJSON([]));
    await new FieldExtractionEngine(llm, OPTIONS, NOW).extractFields(REFERRAL, PA_STANDARD_SCHEMA, true);

    expect(llm.calls).toHaveLength(1);
    const [request] = llm.calls;
    expect(request.prompt).toContain("Patient: Jane Doe, DOB: 01/02/1980");
    expect(request.prompt).toContain("- patient_name (text): Patient Name. Full name of the patient");
    expect(request.images).toEqual([]);
    expect(request.responseFormat).toBe("json");
  });

  it("freezes extracted fields", async () => {
    const llm = fakeLLM(() => extractionJSON([{ name: "patient_name", value: "Jane Doe", confidence: 0.9 }]));
    const result = await new FieldExtractionEngine(llm, OPTIONS, NOW).extractFields(REFERRAL, PA_STANDARD_SCHEMA, false);
    expect(Object.isFrozen(result.fields[0])).toBe(true);
  });

  it("attaches rendered pages when vision is enabled", async () => {
    const llm = fakeLLM(() => extractionJSON([{ name: "member_id", value: "XYZ987" }]));
    const content = documentFromPages([scannedPage(1), scannedPage(2)]);

    const result = await new FieldExtractionEngine(llm, OPTIONS, NOW).extractFields(content, PA_STANDARD_SCHEMA, true);

    expect(llm.calls[0].images).toHaveLength(2);
    expect(result.metadata.mode).toBe("vision");
    expect(result.fields).toEqual([
      { name: "member_id", value: "XYZ987", confidence: DEFAULT_CONFIDENCE.vision, confidenceSource: "default" },
    ]);
  });

  it("limits the number of images", async () => {
    const llm = fakeLLM(() => extractionJSON([]));
    const content = documentFromPages([scannedPage(1), scannedPage(2), scannedPage(3)]);

    await new FieldExtractionEngine(llm, { ...OPTIONS, maxImages: 2 }, NOW).extractFields(content, PA_STANDARD_SCHEMA, true);

    expect(llm.calls[0].images).toHaveLength(2);
  });

  it("does not call the model for a scanned package without vision", async () => {
    const llm = fakeLLM(() => extractionJSON([{ name: "patient_name", value: "Invented Name", confidence: 1 }]));
    const content = documentFromPages([scannedPage(1)]);

    const result = await new FieldExtractionEngine(llm, OPTIONS, NOW).extractFields(content, PA_STANDARD_SCHEMA, false);

    expect(llm.calls).toHaveLength(0);
    expect(result.fields).toEqual([]);
    expect(result.metadata.mode).toBe("none");
  });

  it("propagates provider errors", async () => {
    const llm = fakeLLM(() => {
      throw new ExtractionProviderError("openai rate limited: slow down", "openai", 429);
    });
    const engine = new FieldExtractionEngine(llm, OPTIONS, NOW);

    await expect(engine.extractFields(REFERRAL, PA_STANDARD_SCHEMA, false)).rejects.toBeInstanceOf(ExtractionProviderError);
  });

  it("fails with ProviderTimeoutError when the provider does not answer in time", async () => {
    const llm = fakeLLM(() => new Promise<string>(() => {}));
    const engine = new FieldExtractionEngine(llm, { ...OPTIONS, timeoutMs: 20 }, NOW);

    await expect(engine.extractFields(REFERRAL, PA_STANDARD_SCHEMA, false)).rejects.toBeInstanceOf(ProviderTimeoutError);
  });

  it("fails with ExtractionParseError on a non-JSON answer", async () => {
    const llm = fakeLLM(() => "I could not find any fields.");
    const engine = new FieldExtractionEngine(llm, OPTIONS, NOW);

    await expect(engine.extractFields(REFERRAL, PA_STANDARD_SCHEMA, false)).rejects.toBeInstanceOf(ExtractionParseError);
  });
});

describe("parseExtractionResponse", () => {
  it("accepts a fenced JSON answer", () => {
    const content = "```json\n" + extractionJSON([{ name: "diagnosis", value: "Type 2 diabetes", confidence: 0.8 }]) + "\n```";
    const fields = parseExtractionResponse(content, PA_STANDARD_SCHEMA, 0.5);
    expect(fields.map(f => f.name)).toEqual(["diagnosis"]);
  });

  it("omits unknown names and values that are empty or NOT_FOUND", () => {
    const fields = parseExtractionResponse(
      extractionJSON([
        { name: "favourite_colour", value: "blue", confidence: 0.9 },
        { name: "member_id", value: "NOT_FOUND", confidence: 0.9 },
        { name: "group_number", value: "   ", confidence: 0.9 },
        { name: "diagnosis", value: "Type 2 diabetes", confidence: 0.8 },
      ]),
      PA_STANDARD_SCHEMA,
      0.5
    );
    expect(fields.map(f => f.name)).toEqual(["diagnosis"]);
  });

  it("skips entries that fail validation", () => {
    const content = JSON.stringify({
      extracted_fields: [{ value: "no name" }, { name: "diagnosis", value: { nested: true } }, { name: "cpt_codes", value: ["99213"] }],
    });
    const fields = parseExtractionResponse(content, PA_STANDARD_SCHEMA, 0.5);
    expect(fields).toEqual([{ name: "cpt_codes", value: ["99213"], confidence: 0.5, confidenceSource: "default" }]);
  });

  it("keeps the higher confidence for duplicate names", () => {
    const fields = parseExtractionResponse(
      extractionJSON([
        { name: "patient_name", value: "J. Doe", confidence: 0.6 },
        { name: "patient_name", value: "Jane Doe", confidence: 0.9 },
      ]),
      PA_STANDARD_SCHEMA,
      0.5
    );
    expect(fields).toEqual([{ name: "patient_name", value: "Jane Doe", confidence: 0.9, confidenceSource: "model" }]);
  });

  it("clamps confidence to [0, 1]", () => {
    const fields = parseExtractionResponse(
      extractionJSON([
        { name: "patient_name", value: "Jane Doe", confidence: 1.4 },
        { name: "member_id", value: "XYZ987", confidence: -0.2 },
      ]),
      PA_STANDARD_SCHEMA,
      0.5
    );
    expect(fields.map(f => f.confidence)).toEqual([1, 0]);
  });

  it("splits a comma-separated code list", () => {
    const fields = parseExtractionResponse(
      extractionJSON([{ name: "icd_10_codes", value: "E11.9, I10; Z79.4", confidence: 0.8 }]),
      PA_STANDARD_SCHEMA,
      0.5
    );
    expect(fields[0].value).toEqual(["E11.9", "I10", "Z79.4"]);
  });

  it("keeps source text and page when given", () => {
    const content = JSON.stringify({
      extracted_fields: [{ name: "patient_name", value: "Jane Doe", confidence: 0.9, source_text: "Patient: Jane Doe", page: 2 }],
    });
    expect(parseExtractionResponse(content, PA_STANDARD_SCHEMA, 0.5)[0]).toEqual({
      name: "patient_name",
      value: "Jane Doe",
      confidence: 0.9,
      confidenceSource: "model",
      sourceText: "Patient: Jane Doe",
      page: 2,
    });
  });

  it("keeps the value when page, source text or confidence is malformed", () => {
    const content = JSON.stringify({
      extracted_fields: [
        { name: "patient_name", value: "Jane Doe", confidence: 0.9, page: 0 },
        { name: "member_id", value: "X1", source_text: 42 },
        { name: "patient_dob", value: "01/02/1980", confidence: "0.9" },
        { name: "diagnosis", value: "Type 2 diabetes", confidence: "high" },
      ],
    });

    expect(parseExtractionResponse(content, PA_STANDARD_SCHEMA, 0.5)).toEqual([
      { name: "patient_name", value: "Jane Doe", confidence: 0.9, confidenceSource: "model" },
      { name: "patient_dob", value: "01/02/1980", confidence: 0.9, confidenceSource: "model" },
      { name: "member_id", value: "X1", confidence: 0.5, confidenceSource: "default" },
      { name: "diagnosis", value: "Type 2 diabetes", confidence: 0.5, confidenceSource: "default" },
    ]);
  });

  it("rejects JSON without an extracted_fields array", () => {
    expect(() => parseExtractionResponse('{"fields": []}', PA_STANDARD_SCHEMA, 0.5)).toThrow(ExtractionParseError);
  });
});

describe("buildExtractionPrompt", () => {
  it("describes image input when pages are attached", () => {
    const prompt = buildExtractionPrompt(PA_STANDARD_SCHEMA, "", 2);
    expect(prompt).toContain("The 2 attached image(s) are scanned pages of the referral package.");
    expect(prompt).toContain("(no extractable text)");
  });
});

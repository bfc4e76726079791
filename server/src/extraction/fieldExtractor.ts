/**
 * Field Extraction Engine
 *
 * Sends referral package text (and page images when vision is enabled) to the
 * configured LLM together with the extraction schema, then validates the JSON
 * answer into an ExtractionResult. Fields the model does not report, or
 * reports without a usable value, are left out of the result.
 */

import { z } from "zod";
import type {
  DocumentContent,
  ExtractedField,
  ExtractedValue,
  ExtractionMode,
  ExtractionResult,
  ExtractionSchema,
  FieldDescriptor,
} from "@shared/schema";
import type { LLMService } from "../agents/llmService";
import { parseJSONContent } from "../agents/llmService";
import { ExtractionParseError, ProviderTimeoutError } from "../errors";
import { createLogger } from "../logger";
import { buildTextContext } from "./contextRetriever";

const logger = createLogger("FieldExtractor");

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Confidence assigned when the model omits one. Text-only answers get the
 * lower value; both sit below the default 0.7 threshold so unscored values
 * are reviewed.
 */
export const DEFAULT_CONFIDENCE: Record<Exclude<ExtractionMode, "none">, number> = {
  vision: 0.6,
  text: 0.5,
};

const NOT_FOUND_MARKERS = new Set(["not_found", "not found", "n/a", "none", "null", "unknown"]);

export const SYSTEM_PROMPT =
  "You are a medical document extraction assistant. Extract information accurately " +
  "from referral documents and return valid JSON only.";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface FieldExtractionOptions {
  timeoutMs: number;
  maxImages: number;
  contextChars: number;
  chunkSize: number;
  chunkOverlap: number;
}

export interface FieldExtractor {
  extractFields(
    content: DocumentContent,
    schema: ExtractionSchema,
    useVision: boolean,
    traceContext?: { folder?: string }
  ): Promise<ExtractionResult>;
}

const ModelFieldZ = z.object({
  name: z.string().min(1),
  value: z
    .union([z.string(), z.number(), z.array(z.union([z.string(), z.number()]))])
    .nullable()
    .optional(),
  // Metadata is best-effort: a malformed key is dropped, never the value
  confidence: z
    .preprocess(v => (typeof v === "string" && v.trim() !== "" ? Number(v) : v), z.number().finite())
    .nullable()
    .optional()
    .catch(undefined),
  source_text: z.string().nullable().optional().catch(undefined),
  page: z.number().int().positive().nullable().optional().catch(undefined),
});
type ModelField = z.infer<typeof ModelFieldZ>;

const ModelResponseZ = z.object({
  extracted_fields: z.array(z.unknown()),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PROMPT
// ═══════════════════════════════════════════════════════════════════════════════

export function describeSchema(schema: ExtractionSchema): string {
  return schema.fields
    .map(f => `- ${f.name} (${f.kind}): ${f.label}. ${f.description}`)
    .join("\n");
}

export function buildExtractionPrompt(
  schema: ExtractionSchema,
  documentText: string,
  imageCount: number
): string {
  const source = imageCount > 0
    ? `The ${imageCount} attached image(s) are scanned pages of the referral package.` +
      (documentText ? " Text extracted from the remaining pages follows." : "")
    : "The referral package text follows.";

  return `Extract Prior Authorization fields from a medical referral package.

${source}

DOCUMENT CONTENT:
${documentText || "(no extractable text)"}

FIELDS TO EXTRACT (schema ${schema.id} v${schema.version}):
${describeSchema(schema)}

INSTRUCTIONS:
1. Only extract values explicitly stated in the document. Never guess.
2. If a field is not present, set its value to "NOT_FOUND".
3. For code-list fields return an array of codes.
4. Report your confidence for each value between 0.0 and 1.0.

RESPONSE FORMAT:
{
  "extracted_fields": [
    { "name": "field_name", "value": "value or NOT_FOUND", "confidence": 0.0, "source_text": "supporting text", "page": 1 }
  ]
}`;
}

function tablesAsText(content: DocumentContent): string {
  const lines: string[] = [];
  for (const page of content.pages) {
    for (const table of page.tables) {
      lines.push(`[table, page ${page.pageNumber}]`);
      lines.push(...table.rows.map(row => row.join(" | ")));
    }
  }
  return lines.join("\n");
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function normalizeValue(raw: ModelField["value"], descriptor: FieldDescriptor): ExtractedValue | null {
  if (raw === null || raw === undefined) return null;

  const clean = (v: string | number) => String(v).trim();
  const usable = (v: string) => v.length > 0 && !NOT_FOUND_MARKERS.has(v.toLowerCase());

  if (Array.isArray(raw)) {
    const items = raw.map(clean).filter(usable);
    return items.length > 0 ? items : null;
  }

  const text = clean(raw);
  if (!usable(text)) return null;

  if (descriptor.kind === "code-list") {
    const codes = text.split(/[,;\n]+/).map(c => c.trim()).filter(usable);
    return codes.length > 0 ? codes : null;
  }
  return text;
}

function clampConfidence(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Validates the model's JSON answer against the schema.
 *
 * @throws ExtractionParseError when the content is not JSON or lacks an
 *   `extracted_fields` array
 */
export function parseExtractionResponse(
  content: string,
  schema: ExtractionSchema,
  defaultConfidence: number
): ExtractedField[] {
  let data: unknown;
  try {
    data = parseJSONContent(content);
  } catch (error) {
    throw new ExtractionParseError(
      `Model response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      content.slice(0, 200),
      { cause: error }
    );
  }

  const envelope = ModelResponseZ.safeParse(data);
  if (!envelope.success) {
    throw new ExtractionParseError("Model response has no 'extracted_fields' array", content.slice(0, 200));
  }

  const descriptors = new Map(schema.fields.map(f => [f.name, f]));
  const byName = new Map<string, ExtractedField>();

  for (const entry of envelope.data.extracted_fields) {
    const parsed = ModelFieldZ.safeParse(entry);
    if (!parsed.success) continue;

    const descriptor = descriptors.get(parsed.data.name);
    if (!descriptor) continue;

    const value = normalizeValue(parsed.data.value, descriptor);
    if (value === null) continue;

    const reported = parsed.data.confidence;
    const field: ExtractedField = {
      name: descriptor.name,
      value,
      confidence: typeof reported === "number" ? clampConfidence(reported) : defaultConfidence,
      confidenceSource: typeof reported === "number" ? "model" : "default",
      ...(parsed.data.source_text ? { sourceText: parsed.data.source_text } : {}),
      ...(parsed.data.page ? { page: parsed.data.page } : {}),
    };

    const existing = byName.get(field.name);
    if (!existing || field.confidence > existing.confidence) {
      byName.set(field.name, field);
    }
  }

  // Schema order, frozen
  return schema.fields
    .map(f => byName.get(f.name))
    .filter((f): f is ExtractedField => f !== undefined)
    .map(f => Object.freeze(f));
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, provider: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProviderTimeoutError(provider, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export class FieldExtractionEngine implements FieldExtractor {
  constructor(
    private readonly llm: LLMService,
    private readonly options: FieldExtractionOptions,
    private readonly now: () => Date = () => new Date()
  ) {}

  async extractFields(
    content: DocumentContent,
    schema: ExtractionSchema,
    useVision: boolean,
    traceContext?: { folder?: string }
  ): Promise<ExtractionResult> {
    const images = useVision
      ? content.pages
          .map(p => p.image)
          .filter((img): img is Uint8Array => img !== null)
          .slice(0, this.options.maxImages)
      : [];

    const textPages = content.pages.filter(p => p.text.trim().length > 0);
    const tables = tablesAsText(content);
    const documentText = [
      buildTextContext(textPages, schema.fields, {
        maxChars: this.options.contextChars,
        chunkSize: this.options.chunkSize,
        chunkOverlap: this.options.chunkOverlap,
      }),
      tables ? `TABLES:\n${tables}` : "",
    ].filter(Boolean).join("\n\n");

    const mode: ExtractionMode = images.length > 0 ? "vision" : documentText ? "text" : "none";
    const metadata = {
      provider: this.llm.provider,
      model: this.llm.model,
      mode,
      visionEnabled: useVision,
      schemaVersion: `${schema.id}@${schema.version}`,
      extractedAt: this.now().toISOString(),
    };

    if (mode === "none") {
      logger.warn(`No text or page images to send for ${traceContext?.folder ?? content.filePath}; skipping model call`);
      return { fields: [], metadata };
    }

    logger.info(
      `Extracting ${schema.fields.length} fields (${mode}, ${images.length} images, ` +
      `${documentText.length} chars) with ${this.llm.provider}/${this.llm.model}`
    );

    const response = await withTimeout(
      this.llm.complete({
        system: SYSTEM_PROMPT,
        prompt: buildExtractionPrompt(schema, documentText, images.length),
        images,
        responseFormat: "json",
        traceContext: { folder: traceContext?.folder, operation: "extract_fields" },
      }),
      this.options.timeoutMs,
      this.llm.provider
    );

    const fields = parseExtractionResponse(response.content, schema, DEFAULT_CONFIDENCE[mode]);
    logger.info(`Model returned ${fields.length}/${schema.fields.length} fields`);

    return { fields, metadata: { ...metadata, model: response.model } };
  }
}

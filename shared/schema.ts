import { z } from "zod";

// ============== PROVIDERS ==============
export const aiProviderEnum = ["openai", "anthropic"] as const;
export type AIProvider = typeof aiProviderEnum[number];
export const AIProviderZ = z.enum(aiProviderEnum);

// ============== FIELD VOCABULARY ==============
export const fieldKindEnum = ["text", "date", "code-list", "phone", "identifier", "narrative"] as const;
export type FieldKind = typeof fieldKindEnum[number];

export const fieldCategoryEnum = ["patient", "insurance", "provider", "clinical", "medication", "service"] as const;
export type FieldCategory = typeof fieldCategoryEnum[number];

export interface FieldDescriptor<TName extends string = string> {
  name: TName;
  label: string;
  description: string;
  kind: FieldKind;
  category: FieldCategory;
}

export interface ExtractionSchema<TName extends string = string> {
  id: string;
  version: string;
  fields: readonly FieldDescriptor<TName>[];
}

// ============== DOCUMENT CONTENT ==============
export interface PageTable {
  pageNumber: number;
  rows: string[][];
}

export interface PageContent {
  pageNumber: number;
  text: string;
  tables: PageTable[];
  scanned: boolean;
  /** PNG bytes, only for scanned pages that were rendered */
  image: Uint8Array | null;
}

export interface DocumentContent {
  filePath: string;
  contentHash: string;
  pageCount: number;
  pages: PageContent[];
  fullText: string;
  /** Problems that degraded the content without failing the read */
  warnings: string[];
}

// ============== EXTRACTION ==============
export const ExtractedValueZ = z.union([z.string(), z.array(z.string())]);
export type ExtractedValue = z.infer<typeof ExtractedValueZ>;

export const ExtractedFieldZ = z.object({
  name: z.string().min(1),
  value: ExtractedValueZ,
  confidence: z.number().min(0).max(1),
  confidenceSource: z.enum(["model", "default"]),
  sourceText: z.string().optional(),
  page: z.number().int().positive().optional(),
});
export type ExtractedField = z.infer<typeof ExtractedFieldZ>;

export const extractionModeEnum = ["text", "vision", "none"] as const;
export type ExtractionMode = typeof extractionModeEnum[number];

export const ExtractionMetadataZ = z.object({
  provider: AIProviderZ,
  model: z.string(),
  mode: z.enum(extractionModeEnum),
  visionEnabled: z.boolean(),
  schemaVersion: z.string(),
  extractedAt: z.string(),
});
export type ExtractionMetadata = z.infer<typeof ExtractionMetadataZ>;

export interface ExtractionResult {
  fields: readonly ExtractedField[];
  metadata: ExtractionMetadata;
}

// ============== FORM ==============
export const formFieldTypeEnum = ["text", "checkbox", "dropdown", "radio"] as const;
export type FormFieldType = typeof formFieldTypeEnum[number];

export const FormFieldZ = z.object({
  name: z.string(),
  label: z.string(),
  type: z.enum(formFieldTypeEnum),
  options: z.array(z.string()),
  page: z.number().int().positive().nullable(),
});
export type FormField = z.infer<typeof FormFieldZ>;

export const fillStatusEnum = ["filled", "uncertain", "missing"] as const;

export const matchMethodEnum = ["exact", "normalized", "synonym", "fuzzy", "none"] as const;
export type MatchMethod = typeof matchMethodEnum[number];

export const FilledFieldZ = z.object({
  formField: z.string(),
  label: z.string(),
  matchedField: z.string().nullable(),
  matchMethod: z.enum(matchMethodEnum),
  value: z.string().nullable(),
  confidence: z.number().min(0).max(1),
  status: z.enum(fillStatusEnum),
  reason: z.string().optional(),
});
export type FilledField = z.infer<typeof FilledFieldZ>;

// ============== FOLDERS ==============
export interface PatientFolder {
  name: string;
  path: string;
  paFormPath: string | null;
  referralPackagePath: string | null;
  ready: boolean;
  reasons: string[];
}

export interface InvalidFolder {
  name: string;
  reasons: string[];
}

// ============== PROCESSING RESULTS ==============
export const folderStateEnum = ["pending", "extracting", "filling", "reporting", "done", "failed"] as const;
export type FolderState = typeof folderStateEnum[number];

export interface ProcessingError {
  code: string;
  message: string;
  stage: FolderState;
}

export interface ProcessingSummary {
  total: number;
  filled: number;
  uncertain: number;
  missing: number;
  completionRate: number;
}

export interface ProcessingResult {
  folder: string;
  status: FolderState;
  filledFields: FilledField[];
  unfilledFields: string[];
  outputs: {
    filledFormPath: string | null;
    reportPath: string | null;
  };
  formMode: "filled" | "report-only" | null;
  extraction: (ExtractionMetadata & { fieldCount: number }) | null;
  summary: ProcessingSummary;
  warnings: string[];
  error: ProcessingError | null;
  startedAt: string;
  completedAt: string | null;
  durationMs: number;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  invalid: number;
  fieldsFilled: number;
  fieldsUncertain: number;
  fieldsMissing: number;
}

export interface BatchResult {
  runId: string;
  results: Record<string, ProcessingResult>;
  invalid: InvalidFolder[];
  summary: BatchSummary;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

// ============== API REQUESTS ==============
export const ProcessOptionsZ = z.object({
  provider: AIProviderZ.optional(),
  useVision: z.boolean().optional(),
});

export const ProcessRequestZ = z.object({
  folderName: z.string().min(1),
  options: ProcessOptionsZ.optional(),
});

export const BatchProcessRequestZ = z.object({
  folderNames: z.array(z.string().min(1)).optional(),
  parallel: z.boolean().optional(),
  maxWorkers: z.number().int().positive().max(32).optional(),
  options: ProcessOptionsZ.optional(),
});

export const ConfigUpdateZ = z.object({
  provider: AIProviderZ.optional(),
  useVision: z.boolean().optional(),
  confidenceThreshold: z.number().min(0).max(1).optional(),
  openaiApiKey: z.string().min(1).optional(),
  anthropicApiKey: z.string().min(1).optional(),
}).strict();
export type ConfigUpdate = z.infer<typeof ConfigUpdateZ>;

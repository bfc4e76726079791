/**
 * Processing Orchestrator
 *
 * Runs one patient folder through extract -> fill -> report, or a batch of
 * folders sequentially or on a bounded worker pool. Per-folder failures are
 * recorded on that folder's result and never abort a batch.
 *
 * Folder state machine:
 *   pending -> extracting -> filling -> reporting -> done
 *   any stage -> failed
 */

import fs from "fs/promises";
import path from "path";
import pLimit from "p-limit";
import { v4 as uuidv4 } from "uuid";
import type {
  AIProvider,
  BatchResult,
  BatchSummary,
  ExtractionResult,
  ExtractionSchema,
  FilledField,
  FolderState,
  FormField,
  InvalidFolder,
  PatientFolder,
  ProcessingResult,
  ProcessingSummary,
} from "@shared/schema";
import { createLLMService } from "../agents/llmService";
import type { AppConfig } from "../config";
import {
  DocumentReadError,
  FolderNotFoundError,
  FormSchemaError,
  InvalidFolderError,
  errorCode,
  errorMessage,
} from "../errors";
import { FieldExtractionEngine, type FieldExtractor } from "../extraction/fieldExtractor";
import { PA_STANDARD_SCHEMA } from "../extraction/paFieldSchema";
import { fill } from "../forms/fieldMatcher";
import { appendValuesPage, readFormFields, writeFilledForm } from "../forms/pdfFormFiller";
import { createLogger } from "../logger";
import { pdfDocumentExtractor, type DocumentExtractor } from "../parsers/pdfExtractor";
import { generateReport } from "../render/reportGenerator";
import { getPatientFolder, listPatientFolders } from "./folderScanner";
import { ResultStore } from "./resultStore";

const logger = createLogger("Orchestrator");

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface FolderProcessOptions {
  provider?: AIProvider;
  useVision?: boolean;
}

export interface BatchProcessOptions extends FolderProcessOptions {
  parallel?: boolean;
  maxWorkers?: number;
  /** Subset of folders; defaults to every folder in the input directory */
  folderNames?: string[];
  onResult?: (result: ProcessingResult) => void;
}

export type FieldExtractorFactory = (config: AppConfig, provider: AIProvider) => FieldExtractor;
export type OutputWriter = (filePath: string, bytes: Uint8Array) => Promise<void>;

export interface ProcessingDeps {
  documentExtractor: DocumentExtractor;
  createFieldExtractor: FieldExtractorFactory;
  schema: ExtractionSchema;
  writeOutput: OutputWriter;
  clock: () => Date;
  resultStore: ResultStore;
}

export const createDefaultFieldExtractor: FieldExtractorFactory = (config, provider) =>
  new FieldExtractionEngine(createLLMService(config.ai, provider), {
    timeoutMs: config.ai.timeoutMs,
    maxImages: config.processing.maxImages,
    contextChars: config.processing.contextChars,
    chunkSize: config.processing.chunkSize,
    chunkOverlap: config.processing.chunkOverlap,
  });

const writeFileOutput: OutputWriter = async (filePath, bytes) => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, bytes);
};

export function outputPaths(outputDir: string, folder: string) {
  const dir = path.join(outputDir, folder);
  return {
    filledFormPath: path.join(dir, `filled_PA_${folder}.pdf`),
    reportPath: path.join(dir, `extraction_report_${folder}.pdf`),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// BATCH COLLECTOR
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One slot per folder. Workers finish in any order; the record is keyed by
 * folder name and a second insert for the same folder is rejected.
 */
export class BatchResultCollector {
  private readonly results = new Map<string, ProcessingResult>();

  add(result: ProcessingResult): void {
    if (this.results.has(result.folder)) {
      throw new Error(`Duplicate result for folder '${result.folder}'`);
    }
    this.results.set(result.folder, result);
  }

  get size(): number {
    return this.results.size;
  }

  toRecord(order: string[]): Record<string, ProcessingResult> {
    const record: Record<string, ProcessingResult> = {};
    for (const name of order) {
      const result = this.results.get(name);
      if (result) record[name] = result;
    }
    return record;
  }
}

export function summarize(filled: readonly FilledField[]): ProcessingSummary {
  const count = (status: FilledField["status"]) => filled.filter(f => f.status === status).length;
  const total = filled.length;
  const filledCount = count("filled");
  return {
    total,
    filled: filledCount,
    uncertain: count("uncertain"),
    missing: count("missing"),
    completionRate: total > 0 ? filledCount / total : 0,
  };
}

export function summarizeBatch(results: ProcessingResult[], invalid: InvalidFolder[]): BatchSummary {
  return {
    total: results.length + invalid.length,
    succeeded: results.filter(r => r.status === "done").length,
    failed: results.filter(r => r.status === "failed").length,
    invalid: invalid.length,
    fieldsFilled: results.reduce((n, r) => n + r.summary.filled, 0),
    fieldsUncertain: results.reduce((n, r) => n + r.summary.uncertain, 0),
    fieldsMissing: results.reduce((n, r) => n + r.summary.missing, 0),
  };
}

/** Form fields for report-only runs: one per schema descriptor. */
function vocabularyFormFields(schema: ExtractionSchema): FormField[] {
  return schema.fields.map(d => ({ name: d.name, label: d.label, type: "text", options: [], page: null }));
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

export class ProcessingService {
  private readonly deps: ProcessingDeps;

  constructor(
    private config: AppConfig,
    deps: Partial<ProcessingDeps> = {}
  ) {
    this.deps = {
      documentExtractor: deps.documentExtractor ?? pdfDocumentExtractor,
      createFieldExtractor: deps.createFieldExtractor ?? createDefaultFieldExtractor,
      schema: deps.schema ?? PA_STANDARD_SCHEMA,
      writeOutput: deps.writeOutput ?? writeFileOutput,
      clock: deps.clock ?? (() => new Date()),
      resultStore: deps.resultStore ?? new ResultStore(),
    };
  }

  getConfig(): AppConfig {
    return this.config;
  }

  /** Later runs use the new config; runs in flight keep theirs. */
  setConfig(config: AppConfig): void {
    this.config = config;
  }

  get results(): ResultStore {
    return this.deps.resultStore;
  }

  listFolders(): Promise<PatientFolder[]> {
    return listPatientFolders(this.config.inputDir);
  }

  getFolder(name: string): Promise<PatientFolder> {
    return getPatientFolder(this.config.inputDir, name);
  }

  /**
   * @throws ConfigurationError when the provider is not configured
   * @throws FolderNotFoundError / InvalidFolderError before any extraction
   */
  async processFolder(name: string, options: FolderProcessOptions = {}): Promise<ProcessingResult> {
    const config = this.config;
    const provider = options.provider ?? config.ai.provider;

    const folder = await getPatientFolder(config.inputDir, name);
    if (!folder.ready) {
      throw new InvalidFolderError(folder.name, folder.reasons);
    }
    const extractor = this.deps.createFieldExtractor(config, provider);

    const result = await this.runFolder(folder, extractor, options.useVision ?? config.processing.useVision, config);
    this.deps.resultStore.set(result);
    return result;
  }

  async processAll(options: BatchProcessOptions = {}): Promise<BatchResult> {
    const config = this.config;
    const provider = options.provider ?? config.ai.provider;
    const useVision = options.useVision ?? config.processing.useVision;
    const extractor = this.deps.createFieldExtractor(config, provider);

    const startedAt = this.deps.clock();
    const runId = uuidv4();

    let folders = await listPatientFolders(config.inputDir);
    if (options.folderNames) {
      const known = new Set(folders.map(f => f.name));
      const unknown = options.folderNames.filter(n => !known.has(n));
      if (unknown.length > 0) {
        throw new FolderNotFoundError(unknown.join(", "));
      }
      const wanted = new Set(options.folderNames);
      folders = folders.filter(f => wanted.has(f.name));
    }

    const ready = folders.filter(f => f.ready);
    const invalid: InvalidFolder[] = folders
      .filter(f => !f.ready)
      .map(f => ({ name: f.name, reasons: f.reasons }));
    for (const f of invalid) {
      logger.warn(`Skipping ${f.name}: ${f.reasons.join("; ")}`);
    }

    const parallel = options.parallel ?? false;
    const maxWorkers = options.maxWorkers ?? config.processing.maxWorkers;
    logger.info(
      `Batch ${runId}: ${ready.length} folders` +
      (parallel ? ` on ${maxWorkers} workers` : " sequentially") +
      (invalid.length > 0 ? `, ${invalid.length} invalid` : "")
    );

    const collector = new BatchResultCollector();
    const run = async (folder: PatientFolder) => {
      const result = await this.runFolder(folder, extractor, useVision, config);
      collector.add(result);
      this.deps.resultStore.set(result);
      options.onResult?.(result);
    };

    if (parallel) {
      const limit = pLimit(maxWorkers);
      await Promise.all(ready.map(folder => limit(() => run(folder))));
    } else {
      for (const folder of ready) {
        await run(folder);
      }
    }

    const results = collector.toRecord(ready.map(f => f.name));
    const completedAt = this.deps.clock();
    const summary = summarizeBatch(Object.values(results), invalid);
    logger.info(`Batch ${runId} complete: ${summary.succeeded} done, ${summary.failed} failed, ${summary.invalid} invalid`);

    return {
      runId,
      results,
      invalid,
      summary,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Per-folder pipeline. Never throws.
  // ─────────────────────────────────────────────────────────────────────────────

  private async runFolder(
    folder: PatientFolder,
    extractor: FieldExtractor,
    useVision: boolean,
    config: AppConfig
  ): Promise<ProcessingResult> {
    const { documentExtractor, schema, writeOutput, clock } = this.deps;
    const startedAt = clock();
    const paths = outputPaths(config.outputDir, folder.name);
    const warnings: string[] = [];

    let state: FolderState = "pending";
    const enter = (next: FolderState) => {
      logger.debug(`${folder.name}: ${state} -> ${next}`);
      state = next;
    };

    let extraction: ExtractionResult | null = null;
    let formMode: ProcessingResult["formMode"] = null;
    let filledFormPath: string | null = null;

    const finish = (status: FolderState, filled: FilledField[], error: ProcessingResult["error"]): ProcessingResult => {
      const completedAt = clock();
      return {
        folder: folder.name,
        status,
        filledFields: filled.filter(f => f.status !== "missing"),
        unfilledFields: filled.filter(f => f.status === "missing").map(f => f.formField),
        outputs: { filledFormPath, reportPath: null },
        formMode,
        extraction: extraction ? { ...extraction.metadata, fieldCount: extraction.fields.length } : null,
        summary: summarize(filled),
        warnings: [...warnings],
        error,
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        durationMs: completedAt.getTime() - startedAt.getTime(),
      };
    };

    if (!folder.referralPackagePath || !folder.paFormPath) {
      return finish("failed", [], {
        code: "INVALID_FOLDER",
        message: folder.reasons.join("; ") || "Required files missing",
        stage: state,
      });
    }

    let filled: FilledField[] = [];
    try {
      enter("extracting");
      const content = await documentExtractor.extract(folder.referralPackagePath, {
        minPageChars: config.processing.minPageChars,
        renderScannedPages: useVision,
        dpi: config.processing.renderDpi,
      });
      warnings.push(...content.warnings);
      extraction = await extractor.extractFields(content, schema, useVision, { folder: folder.name });

      enter("filling");
      const formBytes = await readPdf(folder.paFormPath);
      let formFields: FormField[];
      try {
        formFields = await readFormFields(formBytes, folder.paFormPath);
        formMode = "filled";
      } catch (error) {
        if (!(error instanceof FormSchemaError)) throw error;
        warnings.push(`${error.message}; extracted values appended as a page`);
        logger.warn(`${folder.name}: ${error.message}; appending extracted values as a page`);
        formFields = vocabularyFormFields(schema);
        formMode = "report-only";
      }

      filled = fill(formFields, extraction, config.processing.confidenceThreshold);

      if (formMode === "filled") {
        const written = await writeFilledForm(formBytes, filled, folder.paFormPath);
        warnings.push(...written.warnings);
        filled = written.fields;
        await writeOutput(paths.filledFormPath, written.bytes);
      } else {
        const copy = await appendValuesPage(formBytes, filled, clock().toISOString(), folder.paFormPath);
        await writeOutput(paths.filledFormPath, copy);
      }
      filledFormPath = paths.filledFormPath;

      enter("reporting");
      const done = finish("done", filled, null);
      await writeOutput(paths.reportPath, await generateReport(done));
      const result: ProcessingResult = { ...done, outputs: { ...done.outputs, reportPath: paths.reportPath } };

      enter("done");
      logger.info(
        `${folder.name}: done, ${result.summary.filled} filled, ${result.summary.uncertain} uncertain, ` +
        `${result.summary.missing} missing`
      );
      return result;
    } catch (error) {
      const failedStage = state;
      enter("failed");
      logger.error(`${folder.name}: failed during ${failedStage}: ${errorMessage(error)}`);

      const failed = finish("failed", filled, {
        code: errorCode(error),
        message: errorMessage(error),
        stage: failedStage,
      });
      return this.writeFailureReport(failed, paths.reportPath);
    }
  }

  /** Best effort: a report for a failed folder carries the error. */
  private async writeFailureReport(result: ProcessingResult, reportPath: string): Promise<ProcessingResult> {
    try {
      await this.deps.writeOutput(reportPath, await generateReport(result));
      return { ...result, outputs: { ...result.outputs, reportPath } };
    } catch (error) {
      logger.warn(`${result.folder}: could not write failure report: ${errorMessage(error)}`);
      return { ...result, warnings: [...result.warnings, `Report not written: ${errorMessage(error)}`] };
    }
  }
}

async function readPdf(filePath: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new DocumentReadError(`Cannot read ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }
}

/**
 * Builders shared by the test suites: PDFs generated with pdf-lib, patient
 * folders in a temporary directory, and an in-process LLM stand-in.
 */

import fs from "fs/promises";
import os from "os";
import path from "path";
import { PDFDocument, StandardFonts } from "pdf-lib";
import type { AIProvider, DocumentContent, PageContent } from "@shared/schema";
import type { LLMRequest, LLMResponse, LLMService } from "../agents/llmService";
import { loadConfig, type AppConfig } from "../config";

export type FormFieldSpec =
  | { name: string; type?: "text" }
  | { name: string; type: "checkbox" }
  | { name: string; type: "dropdown"; options: string[] };

/** One page per entry, each line drawn top-down in Helvetica 11pt. */
export async function makeTextPdf(pages: string[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  for (const lines of pages) {
    const page = doc.addPage([612, 792]);
    lines.forEach((line, i) => {
      page.drawText(line, { x: 50, y: 740 - i * 20, size: 11, font });
    });
  }
  return doc.save();
}

export async function makeFormPdf(fields: FormFieldSpec[]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const page = doc.addPage([612, 792]);
  const form = doc.getForm();

  fields.forEach((spec, i) => {
    const rect = { x: 200, y: 740 - i * 30, width: 250, height: 20 };
    if (spec.type === "checkbox") {
      form.createCheckBox(spec.name).addToPage(page, { ...rect, width: 14, height: 14 });
    } else if (spec.type === "dropdown") {
      const dropdown = form.createDropdown(spec.name);
      dropdown.addOptions(spec.options);
      dropdown.addToPage(page, rect);
    } else {
      form.createTextField(spec.name).addToPage(page, rect);
    }
  });

  return doc.save();
}

export async function makeTempDir(prefix = "pa-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writePatientFolder(
  inputDir: string,
  name: string,
  files: Record<string, Uint8Array | string>
): Promise<string> {
  const dir = path.join(inputDir, name);
  await fs.mkdir(dir, { recursive: true });
  for (const [filename, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, filename), content);
  }
  return dir;
}

export function testConfig(dirs: { inputDir: string; outputDir: string }, env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    OPENAI_API_KEY: "test-key",
    PA_INPUT_DIR: dirs.inputDir,
    PA_OUTPUT_DIR: dirs.outputDir,
    LOG_LEVEL: "error",
    ...env,
  });
}

export function textPage(pageNumber: number, text: string): PageContent {
  return { pageNumber, text, tables: [], scanned: false, image: null };
}

export function documentFromPages(pages: PageContent[], filePath = "/tmp/referral_package.pdf"): DocumentContent {
  return {
    filePath,
    contentHash: "0000000000000000",
    pageCount: pages.length,
    pages,
    fullText: pages.map(p => p.text).filter(Boolean).join("\n\n"),
    warnings: [],
  };
}

/**
 * LLM stand-in. `reply` returns the completion text for a request, or throws
 * to simulate a provider failure. Requests are recorded in `calls`.
 */
export function fakeLLM(
  reply: (request: LLMRequest) => string | Promise<string>,
  provider: AIProvider = "openai",
  model = "fake-model"
): LLMService & { calls: LLMRequest[] } {
  const calls: LLMRequest[] = [];
  return {
    provider,
    model,
    calls,
    async complete(request: LLMRequest): Promise<LLMResponse> {
      calls.push(request);
      const content = await reply(request);
      return {
        content,
        provider,
        model,
        usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        latencyMs: 0,
        traceData: { requestId: "fake", timestamp: "2024-01-01T00:00:00.000Z" },
      };
    },
  };
}

export function extractionJSON(
  fields: Array<{ name: string; value: string | string[]; confidence?: number }>
): string {
  return JSON.stringify({ extracted_fields: fields });
}

/**
 * Extraction report: filled, uncertain and missing fields for one folder.
 *
 * `buildReportLines` is the whole content; `generateReport` only lays it out.
 * Both depend on the ProcessingResult alone, so identical results give
 * identical reports.
 */

import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage } from "pdf-lib";
import type { FilledField, ProcessingResult } from "@shared/schema";
import { formFieldLabel } from "../forms/fieldMatcher";
import { toWinAnsi } from "./pdfText";

export type ReportLineStyle = "title" | "heading" | "body" | "item" | "muted";

export interface ReportLine {
  text: string;
  style: ReportLineStyle;
}

export const REPORT_TITLE = "Prior Authorization Extraction Report";

const PAGE_SIZE: [number, number] = [595.28, 841.89]; // A4
const MARGIN = 50;

const STYLE: Record<ReportLineStyle, { size: number; bold: boolean; indent: number; gapBefore: number }> = {
  title: { size: 18, bold: true, indent: 0, gapBefore: 0 },
  heading: { size: 13, bold: true, indent: 0, gapBefore: 14 },
  body: { size: 10, bold: false, indent: 0, gapBefore: 2 },
  item: { size: 10, bold: false, indent: 12, gapBefore: 2 },
  muted: { size: 9, bold: false, indent: 12, gapBefore: 2 },
};

function confidence(value: number): string {
  return value.toFixed(2);
}

function section(title: string, items: string[]): ReportLine[] {
  return [
    { text: `${title} (${items.length})`, style: "heading" },
    ...(items.length > 0
      ? items.map((text): ReportLine => ({ text, style: "item" }))
      : [{ text: "None", style: "muted" } satisfies ReportLine]),
  ];
}

function withStatus(result: ProcessingResult, status: FilledField["status"]): FilledField[] {
  return result.filledFields.filter(f => f.status === status);
}

export function buildReportLines(result: ProcessingResult): ReportLine[] {
  const lines: ReportLine[] = [
    { text: REPORT_TITLE, style: "title" },
    { text: `Patient folder: ${result.folder}`, style: "body" },
    { text: `Generated: ${result.completedAt ?? result.startedAt}`, style: "body" },
    { text: `Status: ${result.status}`, style: "body" },
  ];

  if (result.extraction) {
    const e = result.extraction;
    lines.push({
      text: `Extraction: ${e.provider} ${e.model}, ${e.mode} mode, vision ${e.visionEnabled ? "on" : "off"}, ` +
        `${e.fieldCount} fields (schema ${e.schemaVersion})`,
      style: "body",
    });
  }
  if (result.formMode) {
    lines.push({
      text: `PA form: ${result.formMode === "filled" ? "filled" : "not fillable, values appended as a page"}`,
      style: "body",
    });
  }

  const s = result.summary;
  lines.push({
    text: `Summary: ${s.total} form fields, ${s.filled} filled, ${s.uncertain} uncertain, ${s.missing} missing ` +
      `(${Math.round(s.completionRate * 100)}% complete)`,
    style: "body",
  });

  if (result.error) {
    lines.push(
      { text: "Error", style: "heading" },
      { text: `${result.error.code} during ${result.error.stage}: ${result.error.message}`, style: "item" }
    );
  }

  if (result.warnings.length > 0) {
    lines.push({ text: "Warnings", style: "heading" });
    lines.push(...result.warnings.map((text): ReportLine => ({ text, style: "muted" })));
  }

  lines.push(
    ...section(
      "Filled Fields",
      withStatus(result, "filled").map(f => `${f.label}: ${f.value ?? ""} (confidence ${confidence(f.confidence)})`)
    ),
    ...section(
      "Uncertain Fields",
      withStatus(result, "uncertain").map(
        f => `${f.label}: ${f.value ?? ""} (confidence ${confidence(f.confidence)}, ${f.reason ?? "below threshold"})`
      )
    ),
    ...section("Missing Fields", result.unfilledFields.map(formFieldLabel))
  );

  return lines;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PDF LAYOUT
// ═══════════════════════════════════════════════════════════════════════════════

export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const fits = (s: string) => font.widthOfTextAtSize(s, size) <= maxWidth;
  const wrapped: string[] = [];

  for (const paragraph of text.split("\n")) {
    let line = "";
    for (const word of paragraph.split(/\s+/).filter(Boolean)) {
      const candidate = line ? `${line} ${word}` : word;
      if (fits(candidate)) {
        line = candidate;
        continue;
      }
      if (line) wrapped.push(line);

      // Break words wider than the column
      let rest = word;
      while (!fits(rest)) {
        let cut = rest.length - 1;
        while (cut > 1 && !fits(rest.slice(0, cut))) cut--;
        wrapped.push(rest.slice(0, cut));
        rest = rest.slice(cut);
      }
      line = rest;
    }
    wrapped.push(line);
  }

  return wrapped;
}

export async function generateReport(result: ProcessingResult): Promise<Uint8Array> {
  const doc = await PDFDocument.create({ updateMetadata: false });
  const stamp = new Date(result.completedAt ?? result.startedAt);
  doc.setTitle(`${REPORT_TITLE} - ${toWinAnsi(result.folder)}`);
  doc.setProducer("pa-form-filler");
  doc.setCreator("pa-form-filler");
  doc.setCreationDate(stamp);
  doc.setModificationDate(stamp);

  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);
  const [width, height] = PAGE_SIZE;

  let page: PDFPage = doc.addPage(PAGE_SIZE);
  let y = height - MARGIN;

  for (const line of buildReportLines(result)) {
    const style = STYLE[line.style];
    const font = style.bold ? bold : regular;
    const lineHeight = style.size * 1.35;
    const x = MARGIN + style.indent;
    const rows = wrapText(toWinAnsi(line.text), font, style.size, width - MARGIN - x);

    y -= style.gapBefore;
    for (const row of rows) {
      if (y - lineHeight < MARGIN) {
        page = doc.addPage(PAGE_SIZE);
        y = height - MARGIN;
      }
      y -= lineHeight;
      page.drawText(row, {
        x,
        y,
        size: style.size,
        font,
        color: line.style === "muted" ? rgb(0.4, 0.4, 0.4) : rgb(0, 0, 0),
      });
    }
  }

  return doc.save();
}

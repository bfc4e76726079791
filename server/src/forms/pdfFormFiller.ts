/**
 * AcroForm access for the PA form, via pdf-lib.
 */

import {
  PDFCheckBox,
  PDFDocument,
  StandardFonts,
  PDFDropdown,
  PDFOptionList,
  PDFRadioGroup,
  PDFTextField,
  type PDFField,
} from "pdf-lib";
import type { FilledField, FormField, FormFieldType } from "@shared/schema";
import { DocumentReadError, FormSchemaError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import { singleLine, toWinAnsi } from "../render/pdfText";
import { wrapText } from "../render/reportGenerator";
import { formFieldLabel } from "./fieldMatcher";

const logger = createLogger("FormFiller");

const CHECKED_VALUES = new Set(["x", "yes", "y", "true", "1", "checked", "on"]);
const UNCHECKED_VALUES = new Set(["no", "n", "false", "0", "unchecked", "off"]);

export const NOT_WRITTEN = "not written to form";
export const VALUES_PAGE_TITLE = "EXTRACTED INFORMATION FROM REFERRAL PACKAGE";

export interface FormWriteResult {
  bytes: Uint8Array;
  written: number;
  warnings: string[];
  /** The input entries; filled entries the form did not take become uncertain */
  fields: FilledField[];
}

async function loadForm(bytes: Uint8Array, source: string): Promise<PDFDocument> {
  try {
    return await PDFDocument.load(bytes, { updateMetadata: false });
  } catch (error) {
    throw new DocumentReadError(`Cannot open PA form ${source}: ${errorMessage(error)}`, source, { cause: error });
  }
}

function fieldType(field: PDFField): FormFieldType | null {
  if (field instanceof PDFTextField) return "text";
  if (field instanceof PDFCheckBox) return "checkbox";
  if (field instanceof PDFDropdown || field instanceof PDFOptionList) return "dropdown";
  if (field instanceof PDFRadioGroup) return "radio";
  // Buttons and signatures are not fillable
  return null;
}

function fieldOptions(field: PDFField): string[] {
  if (field instanceof PDFDropdown || field instanceof PDFOptionList || field instanceof PDFRadioGroup) {
    return field.getOptions();
  }
  return [];
}

function fieldPage(doc: PDFDocument, field: PDFField): number | null {
  const widget = field.acroField.getWidgets()[0];
  if (!widget) return null;

  const pages = doc.getPages();
  const pageRef = widget.P();
  let page = pages.find(p => p.ref === pageRef);
  if (!page) {
    // Widgets created without /P are found through the pages' annotations
    const widgetRef = doc.context.getObjectRef(widget.dict);
    page = widgetRef ? doc.findPageForAnnotationRef(widgetRef) : undefined;
  }
  return page ? pages.indexOf(page) + 1 : null;
}

/**
 * Lists the fillable fields of a PA form in document order.
 *
 * @throws FormSchemaError when the PDF has no fillable fields
 */
export async function readFormFields(bytes: Uint8Array, source = "PA form"): Promise<FormField[]> {
  const doc = await loadForm(bytes, source);

  let fields: PDFField[];
  try {
    fields = doc.getForm().getFields();
  } catch (error) {
    throw new FormSchemaError(`Cannot read form fields of ${source}: ${errorMessage(error)}`, { cause: error });
  }

  const formFields: FormField[] = [];
  for (const field of fields) {
    const type = fieldType(field);
    if (!type) continue;
    const name = field.getName();
    formFields.push({
      name,
      label: formFieldLabel(name),
      type,
      options: fieldOptions(field),
      page: fieldPage(doc, field),
    });
  }

  if (formFields.length === 0) {
    throw new FormSchemaError(`${source} has no fillable form fields`);
  }
  return formFields;
}

function matchOption(options: string[], value: string): string | undefined {
  const wanted = value.trim().toLowerCase();
  return options.find(option => option.trim().toLowerCase() === wanted);
}

function writeField(field: PDFField, value: string): string | null {
  if (field instanceof PDFTextField) {
    let text = toWinAnsi(value);
    if (!field.isMultiline()) text = singleLine(text);
    const maxLength = field.getMaxLength();
    if (maxLength !== undefined && text.length > maxLength) {
      text = text.slice(0, maxLength);
    }
    field.setText(text);
    return null;
  }

  if (field instanceof PDFCheckBox) {
    const flag = value.trim().toLowerCase();
    if (CHECKED_VALUES.has(flag)) {
      field.check();
    } else if (UNCHECKED_VALUES.has(flag)) {
      field.uncheck();
    } else {
      return `'${value}' is not a checkbox value`;
    }
    return null;
  }

  if (field instanceof PDFDropdown || field instanceof PDFOptionList || field instanceof PDFRadioGroup) {
    const option = matchOption(field.getOptions(), value);
    if (!option) return `no option matching '${value}'`;
    field.select(option);
    return null;
  }

  return "unsupported field type";
}

/**
 * Writes the values of `filled` entries into a copy of the form. Uncertain and
 * missing entries are left blank. A filled entry the form does not take is
 * returned as `uncertain` and its failure becomes a warning.
 */
export async function writeFilledForm(
  bytes: Uint8Array,
  filledFields: readonly FilledField[],
  source = "PA form"
): Promise<FormWriteResult> {
  const doc = await loadForm(bytes, source);
  const form = doc.getForm();
  const warnings: string[] = [];
  let written = 0;

  const fields = filledFields.map((entry): FilledField => {
    if (entry.status !== "filled" || entry.value === null) return entry;

    let problem: string | null;
    const field = form.getFieldMaybe(entry.formField);
    if (!field) {
      problem = "not found";
    } else {
      try {
        problem = writeField(field, entry.value);
      } catch (error) {
        problem = errorMessage(error);
      }
    }

    if (problem === null) {
      written++;
      return entry;
    }
    warnings.push(`Form field '${entry.formField}': ${problem}`);
    return { ...entry, status: "uncertain", reason: `${NOT_WRITTEN}: ${problem}` };
  });

  for (const warning of warnings) logger.warn(warning);
  logger.debug(`Wrote ${written} fields into ${source}`);

  return { bytes: await doc.save(), written, warnings, fields };
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES PAGE (forms without fields)
// ═══════════════════════════════════════════════════════════════════════════════

const VALUES_MARGIN = 50;
const VALUES_FONT_SIZE = 10;
const A4: [number, number] = [595.28, 841.89];

export function buildValuesPageLines(filledFields: readonly FilledField[], generatedAt: string): string[] {
  const lines = [VALUES_PAGE_TITLE, `Generated: ${generatedAt}`, ""];
  const listed = filledFields.filter(f => f.status !== "missing" && f.value !== null);
  if (listed.length === 0) {
    lines.push("No values extracted");
  }
  for (const f of listed) {
    const note = f.status === "uncertain" ? ", uncertain" : "";
    lines.push(`${f.label}: ${f.value ?? ""} (confidence ${Math.round(f.confidence * 100)}%${note})`);
  }
  return lines;
}

/**
 * Copies a form that has no fillable fields and appends pages listing the
 * filled and uncertain values, sized like the form's first page.
 */
export async function appendValuesPage(
  bytes: Uint8Array,
  filledFields: readonly FilledField[],
  generatedAt: string,
  source = "PA form"
): Promise<Uint8Array> {
  const doc = await loadForm(bytes, source);
  const font = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);

  const first = doc.getPages()[0];
  const { width, height } = first ? first.getSize() : { width: A4[0], height: A4[1] };
  const lineHeight = VALUES_FONT_SIZE * 1.4;

  let page = doc.addPage([width, height]);
  let y = height - VALUES_MARGIN;

  buildValuesPageLines(filledFields, generatedAt).forEach((line, index) => {
    const lineFont = index === 0 ? bold : font;
    for (const row of wrapText(toWinAnsi(line), lineFont, VALUES_FONT_SIZE, width - 2 * VALUES_MARGIN)) {
      if (y - lineHeight < VALUES_MARGIN) {
        page = doc.addPage([width, height]);
        y = height - VALUES_MARGIN;
      }
      y -= lineHeight;
      page.drawText(row, { x: VALUES_MARGIN, y, size: VALUES_FONT_SIZE, font: lineFont });
    }
  });

  logger.debug(`Appended extracted values to ${source}`);
  return doc.save();
}

/**
 * Form field matching.
 *
 * Maps each fillable form field to at most one extracted field. Candidates
 * are searched in tiers and the first tier that yields any candidate wins:
 *
 *   exact      form name or label equals the vocabulary name
 *   normalized normalized label equals the normalized vocabulary name
 *   synonym    normalized label is an alias in FIELD_SYNONYMS
 *   fuzzy      one normalized name contains the other
 *
 * Within a tier the most specific match wins (for fuzzy, the longest
 * contained name or alias), then the highest confidence, then extraction
 * order, which is schema order.
 */

import type {
  ExtractedField,
  ExtractedValue,
  ExtractionResult,
  FilledField,
  FormField,
  MatchMethod,
} from "@shared/schema";
import { isPAFieldName, type PAFieldName } from "../extraction/paFieldSchema";
import synonymData from "./fieldSynonyms.json";

const FUZZY_MIN_LENGTH = 4;
// Short aliases (dob, npi, fax) only match whole labels
const FUZZY_MIN_ALIAS_LENGTH = 6;

export const BELOW_THRESHOLD = "below threshold";
export const NO_MATCH = "no matching extracted field";

/** Normalized alias -> vocabulary name */
export const FIELD_SYNONYMS: ReadonlyMap<string, PAFieldName> = new Map(
  Object.entries(synonymData).flatMap(([alias, target]): Array<[string, PAFieldName]> =>
    isPAFieldName(target) ? [[normalizeFieldName(alias), target]] : []
  )
);

/**
 * `form1[0].Page1[0].PatientName[0]` -> `PatientName` -> `patientname`.
 */
export function formFieldLabel(qualifiedName: string): string {
  const segments = qualifiedName.split(".");
  const last = segments[segments.length - 1] ?? qualifiedName;
  return last.replace(/\[\d+\]/g, "").trim() || qualifiedName;
}

export function normalizeFieldName(name: string): string {
  return formFieldLabel(name)
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "");
}

export function formatValue(value: ExtractedValue): string {
  return Array.isArray(value) ? value.join(", ") : value;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MATCHING
// ═══════════════════════════════════════════════════════════════════════════════

interface Candidate {
  field: ExtractedField;
  order: number;
  specificity: number;
}

/** Specificity of the match, 0 when the field does not match. */
type TierScore = (formField: FormField, normalizedLabel: string, field: ExtractedField) => number;

const whole = (matches: boolean): number => (matches ? 1 : 0);

const TIERS: ReadonlyArray<[Exclude<MatchMethod, "none">, TierScore]> = [
  ["exact", (form, _label, field) => whole(form.name === field.name || form.label === field.name)],
  ["normalized", (_form, label, field) => whole(label.length > 0 && label === normalizeFieldName(field.name))],
  ["synonym", (_form, label, field) => whole(FIELD_SYNONYMS.get(label) === field.name)],
  ["fuzzy", (_form, label, field) => fuzzyMatchLength(label, field.name)],
];

/** Length of the longest contained normalized name or alias. */
export function fuzzyMatchLength(label: string, fieldName: string): number {
  if (label.length < FUZZY_MIN_LENGTH) return 0;

  let longest = 0;
  const target = normalizeFieldName(fieldName);
  if (target.length >= FUZZY_MIN_LENGTH && (label.includes(target) || target.includes(label))) {
    longest = Math.min(label.length, target.length);
  }

  for (const [alias, name] of FIELD_SYNONYMS) {
    if (name === fieldName && alias.length >= FUZZY_MIN_ALIAS_LENGTH && label.includes(alias)) {
      longest = Math.max(longest, alias.length);
    }
  }
  return longest;
}

function outranks(c: Candidate, winner: Candidate): boolean {
  if (c.specificity !== winner.specificity) return c.specificity > winner.specificity;
  if (c.field.confidence !== winner.field.confidence) return c.field.confidence > winner.field.confidence;
  return c.order < winner.order;
}

function best(candidates: Candidate[]): Candidate | undefined {
  let winner: Candidate | undefined;
  for (const c of candidates) {
    if (!winner || outranks(c, winner)) winner = c;
  }
  return winner;
}

export function matchFormField(
  formField: FormField,
  fields: readonly ExtractedField[]
): { field: ExtractedField; method: Exclude<MatchMethod, "none"> } | null {
  const label = normalizeFieldName(formField.label || formField.name);

  for (const [method, score] of TIERS) {
    const candidates: Candidate[] = [];
    fields.forEach((field, order) => {
      const specificity = score(formField, label, field);
      if (specificity > 0) candidates.push({ field, order, specificity });
    });
    const winner = best(candidates);
    if (winner) return { field: winner.field, method };
  }
  return null;
}

/**
 * One FilledField per form field, in form order. Confidence at or above the
 * threshold is `filled`, below is `uncertain`, no candidate is `missing`.
 */
export function fill(
  formFields: readonly FormField[],
  extraction: ExtractionResult,
  confidenceThreshold: number
): FilledField[] {
  return formFields.map((formField): FilledField => {
    const match = matchFormField(formField, extraction.fields);

    if (!match) {
      return {
        formField: formField.name,
        label: formField.label,
        matchedField: null,
        matchMethod: "none",
        value: null,
        confidence: 0,
        status: "missing",
        reason: NO_MATCH,
      };
    }

    const { field, method } = match;
    const filled = field.confidence >= confidenceThreshold;
    return {
      formField: formField.name,
      label: formField.label,
      matchedField: field.name,
      matchMethod: method,
      value: formatValue(field.value),
      confidence: field.confidence,
      status: filled ? "filled" : "uncertain",
      ...(filled ? {} : { reason: BELOW_THRESHOLD }),
    };
  });
}

import type { BatchResult, PatientFolder, ProcessingResult } from "@shared/schema";
import { formFieldLabel } from "../forms/fieldMatcher";

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(40);

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export function formatFolderList(folders: PatientFolder[]): string {
  const lines = ["Available patient folders:", THIN_RULE];
  for (const folder of folders) {
    lines.push(`  ${folder.name}: ${folder.ready ? "ready" : "not processable"}`);
    lines.push(`    PA form: ${folder.paFormPath ? "yes" : "no"}  |  Referral package: ${folder.referralPackagePath ? "yes" : "no"}`);
    for (const reason of folder.reasons) {
      lines.push(`    ! ${reason}`);
    }
  }
  lines.push(THIN_RULE);
  lines.push(`Total: ${folders.length} folders (${folders.filter(f => f.ready).length} ready)`);
  return lines.join("\n");
}

export function formatResult(result: ProcessingResult): string {
  const lines = [RULE, `Patient folder: ${result.folder}`, RULE];

  if (result.status !== "done") {
    lines.push(`Status: FAILED`);
    if (result.error) {
      lines.push(`Error (${result.error.code}, during ${result.error.stage}): ${result.error.message}`);
    }
    if (result.outputs.reportPath) lines.push(`Report: ${result.outputs.reportPath}`);
    lines.push(RULE);
    return lines.join("\n");
  }

  lines.push(`Status: SUCCESS in ${(result.durationMs / 1000).toFixed(2)}s`);
  if (result.outputs.filledFormPath) lines.push(`Filled form: ${result.outputs.filledFormPath}`);
  if (result.outputs.reportPath) lines.push(`Report: ${result.outputs.reportPath}`);
  for (const warning of result.warnings) lines.push(`Warning: ${warning}`);

  const filled = result.filledFields.filter(f => f.status === "filled");
  const uncertain = result.filledFields.filter(f => f.status === "uncertain");

  if (filled.length > 0) {
    lines.push("", `FILLED FIELDS (${filled.length}):`, THIN_RULE);
    for (const f of filled) lines.push(`  * ${f.label}: ${f.value ?? ""} (${percent(f.confidence)})`);
  }
  if (uncertain.length > 0) {
    lines.push("", `UNCERTAIN FIELDS (${uncertain.length}):`, THIN_RULE);
    for (const f of uncertain) lines.push(`  * ${f.label}: ${f.value ?? ""} (${percent(f.confidence)})`);
  }
  if (result.unfilledFields.length > 0) {
    lines.push("", `FIELDS NOT FOUND (${result.unfilledFields.length}):`, THIN_RULE);
    for (const name of result.unfilledFields) lines.push(`  * ${formFieldLabel(name)}`);
  }

  const s = result.summary;
  lines.push("", `COMPLETION: ${(s.completionRate * 100).toFixed(1)}% (${s.filled}/${s.total} fields)`, RULE);
  return lines.join("\n");
}

export function formatBatchSummary(batch: BatchResult): string {
  const s = batch.summary;
  const lines = [
    RULE,
    "BATCH PROCESSING SUMMARY",
    RULE,
    `Total folders: ${s.total}`,
    `Successful: ${s.succeeded}`,
    `Failed: ${s.failed}`,
    `Invalid: ${s.invalid}`,
    `Fields filled: ${s.fieldsFilled}, uncertain: ${s.fieldsUncertain}, missing: ${s.fieldsMissing}`,
    `Total time: ${(batch.durationMs / 1000).toFixed(2)}s`,
  ];
  for (const folder of batch.invalid) {
    lines.push(`  skipped ${folder.name}: ${folder.reasons.join("; ")}`);
  }
  for (const result of Object.values(batch.results)) {
    if (result.status === "failed" && result.error) {
      lines.push(`  failed ${result.folder}: ${result.error.message}`);
    }
  }
  lines.push(RULE);
  return lines.join("\n");
}

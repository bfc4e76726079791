import fs from "fs/promises";
import path from "path";
import type { PatientFolder } from "@shared/schema";
import { FolderNotFoundError, errorMessage } from "../errors";

export const PA_FORM_FILENAME = "pa.pdf";
export const REFERRAL_FILENAME = "referral_package.pdf";

const PDF_HEADER = "%PDF-";

async function checkPdf(filePath: string): Promise<string | null> {
  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(filePath, "r");
    const header = Buffer.alloc(PDF_HEADER.length);
    const { bytesRead } = await handle.read(header, 0, PDF_HEADER.length, 0);
    if (bytesRead < PDF_HEADER.length || header.toString("latin1") !== PDF_HEADER) {
      return `${path.basename(filePath)} is not a PDF file`;
    }
    return null;
  } catch (error) {
    return `${path.basename(filePath)} is not readable: ${errorMessage(error)}`;
  } finally {
    await handle?.close();
  }
}

/**
 * Finds the single file named `wanted` (case-insensitive). Zero or several
 * matches produce a reason instead of a path.
 */
async function locate(
  dir: string,
  files: string[],
  wanted: string,
  description: string
): Promise<{ path: string | null; reason: string | null }> {
  const matches = files.filter(f => f.toLowerCase() === wanted);
  if (matches.length === 0) {
    return { path: null, reason: `Missing ${description} (${wanted})` };
  }
  if (matches.length > 1) {
    return { path: null, reason: `More than one ${description}: ${matches.join(", ")}` };
  }
  const filePath = path.join(dir, matches[0]);
  const problem = await checkPdf(filePath);
  return problem ? { path: null, reason: problem } : { path: filePath, reason: null };
}

export async function inspectFolder(dir: string): Promise<PatientFolder> {
  const name = path.basename(dir);
  let files: string[];
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    files = entries.filter(e => e.isFile()).map(e => e.name).sort();
  } catch (error) {
    return { name, path: dir, paFormPath: null, referralPackagePath: null, ready: false, reasons: [`Folder is not readable: ${errorMessage(error)}`] };
  }

  const paForm = await locate(dir, files, PA_FORM_FILENAME, "PA form");
  const referral = await locate(dir, files, REFERRAL_FILENAME, "referral package");
  const reasons = [paForm.reason, referral.reason].filter((r): r is string => r !== null);

  return {
    name,
    path: dir,
    paFormPath: paForm.path,
    referralPackagePath: referral.path,
    ready: reasons.length === 0,
    reasons,
  };
}

/**
 * Patient folders under `inputDir`, sorted by name. Hidden directories are
 * skipped; a missing input directory lists as empty.
 */
export async function listPatientFolders(inputDir: string): Promise<PatientFolder[]> {
  let entries;
  try {
    entries = await fs.readdir(inputDir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
    throw error;
  }

  const names = entries
    .filter(e => e.isDirectory() && !e.name.startsWith("."))
    .map(e => e.name)
    .sort((a, b) => a.localeCompare(b));

  return Promise.all(names.map(n => inspectFolder(path.join(inputDir, n))));
}

/**
 * @throws FolderNotFoundError when `name` is not a directory directly under `inputDir`
 */
export async function getPatientFolder(inputDir: string, name: string): Promise<PatientFolder> {
  if (!name || name !== path.basename(name) || name.startsWith(".")) {
    throw new FolderNotFoundError(name);
  }
  const dir = path.join(inputDir, name);
  const stat = await fs.stat(dir).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new FolderNotFoundError(name);
  }
  return inspectFolder(dir);
}

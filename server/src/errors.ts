/**
 * Pipeline error taxonomy.
 *
 * Every error raised by a pipeline stage carries a stable `code` so the
 * orchestrator can record it on the folder's result and the API can map it
 * to a status code. None of them is retried.
 */

export abstract class PipelineError extends Error {
  abstract readonly code: string;
  readonly retryable = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Source PDF missing, unreadable or not a PDF. */
export class DocumentReadError extends PipelineError {
  readonly code = "DOCUMENT_READ_ERROR";

  constructor(
    message: string,
    public filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ExtractionProviderError extends PipelineError {
  readonly code: string = "EXTRACTION_PROVIDER_ERROR";

  constructor(
    message: string,
    public provider: string,
    public statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ProviderTimeoutError extends ExtractionProviderError {
  readonly code: string = "PROVIDER_TIMEOUT";

  constructor(provider: string, public timeoutMs: number, options?: { cause?: unknown }) {
    super(`${provider} request timed out after ${timeoutMs}ms`, provider, undefined, options);
  }
}

export class ExtractionParseError extends PipelineError {
  readonly code = "EXTRACTION_PARSE_ERROR";

  constructor(
    message: string,
    public responseExcerpt: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The PA form has no usable AcroForm fields. Degrades to report-only output. */
export class FormSchemaError extends PipelineError {
  readonly code = "FORM_SCHEMA_ERROR";
}

export class ConfigurationError extends PipelineError {
  readonly code = "CONFIGURATION_ERROR";
}

export class InvalidFolderError extends PipelineError {
  readonly code = "INVALID_FOLDER";

  constructor(public folder: string, public reasons: string[]) {
    super(`Folder '${folder}' is not processable: ${reasons.join("; ")}`);
  }
}

export class FolderNotFoundError extends PipelineError {
  readonly code = "FOLDER_NOT_FOUND";

  constructor(public folder: string) {
    super(`Folder '${folder}' not found`);
  }
}

export function errorCode(error: unknown): string {
  return error instanceof PipelineError ? error.code : "INTERNAL_ERROR";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

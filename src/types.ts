export interface Letter {
  patientId: string;
  text: string;
}

/**
 * Fields every workflow state carries. The pipeline engine only relies on these.
 */
export interface LetterState {
  patientId: string;
  letter: string;
  outputPath: string;
}

/**
 * State of one extraction run: extracted items are written once by the extractor,
 * processed items once by the processing stage, outputPath once by storage.
 */
export interface ExtractionState<E, P> extends LetterState {
  extractedItems: E[];
  processedItems: P[];
}

/** A terminology match for one search key. Lives only during one item's matching pass. */
export interface Candidate {
  id: string;
  score: number;
  label: string;
}

export class MinerError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  public constructor(message: string, code: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MinerError";
    this.code = code;
    this.context = context;
  }
}

export class ConfigurationError extends MinerError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", context);
    this.name = "ConfigurationError";
  }
}

export class SchemaViolationError extends MinerError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, "SCHEMA_VIOLATION", context);
    this.name = "SchemaViolationError";
  }
}

export class ModelRequestError extends MinerError {
  public constructor(message: string, cause?: unknown) {
    super(message, "MODEL_REQUEST_FAILED", undefined, { cause });
    this.name = "ModelRequestError";
  }
}

export class TerminologyRequestError extends MinerError {
  public readonly service: string;

  public constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(`${service}: ${message}`, "TERMINOLOGY_REQUEST_FAILED", { service, ...context });
    this.name = "TerminologyRequestError";
    this.service = service;
  }
}

export class TerminologyAuthError extends MinerError {
  public constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(`${service} authentication failed: ${message}`, "TERMINOLOGY_AUTH_FAILED", { service, ...context });
    this.name = "TerminologyAuthError";
  }
}

export class StorageError extends MinerError {
  public constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to write table ${path}: ${reason}`, "STORAGE_IO_FAILED", { path }, { cause });
    this.name = "StorageError";
  }
}

export class PipelineError extends MinerError {
  public readonly node: string;

  public constructor(node: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Node "${node}" failed: ${reason}`, "PIPELINE_ERROR", { node }, { cause });
    this.name = "PipelineError";
    this.node = node;
  }
}

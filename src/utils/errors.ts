/**
 * Error Taxonomy
 *
 * Every failure the pipeline can raise derives from ResearchError so the CLI
 * can report one message and exit non-zero. Tool-level problems are modelled
 * as values (see Result) and only become exceptions when a caller decides to
 * give up.
 */

export class ResearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Failures talking to the LLM provider. */
export class ModelError extends ResearchError {}

export type TransientErrorCode = 'throttling' | 'service_unavailable' | 'internal_error';

/** Retryable provider failure (throttling, overload, 5xx). */
export class TransientProviderError extends ModelError {
  readonly code: TransientErrorCode;

  constructor(code: TransientErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

/** Non-retryable provider failure, or retries exhausted. */
export class FatalProviderError extends ModelError {
  readonly status: number | undefined;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/** Anything the provider client threw that was not an HTTP error. */
export class UnexpectedProviderError extends ModelError {}

export class DataCollectionError extends ResearchError {}

export class ReportGenerationError extends ResearchError {}

export class ToolError extends ResearchError {
  readonly tool: string;

  constructor(tool: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.tool = tool;
  }
}

export class ConfigurationError extends ResearchError {}

/** A pipeline stage failed; carries the stage name for the final report. */
export class ResearchStageError extends ResearchError {
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    super(`Stage "${stage}" failed: ${errorMessage(cause)}`, { cause });
    this.stage = stage;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

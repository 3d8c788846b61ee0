import type { StrategyAttempt } from "./contracts";

export type PipelineErrorKind = "format" | "detection" | "matching";

export type PipelineErrorDetails = {
  headers?: string[];
  salesDetected?: string;
  billDetected?: string;
  headerRowIndex?: number;
  attempts?: StrategyAttempt[];
};

/**
 * A fatal, user-reportable failure of the upload pipeline. Anything else
 * thrown from the pipeline is an internal error.
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly details: PipelineErrorDetails;

  constructor(kind: PipelineErrorKind, message: string, details: PipelineErrorDetails = {}) {
    super(message);
    this.name = "PipelineError";
    this.kind = kind;
    this.details = details;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown, fallback = "server error") {
  return err instanceof Error ? err.message : fallback;
}

/**
 * Error taxonomy for the slide pipeline.
 *
 * Fatal: FetchError, FrameCaptureError, and ProviderCallError when the failing
 * call is the only source for a stage (transcription without a platform track).
 * Recovered locally: ProviderCallError inside translation/outline,
 * TranslationMismatchError. CancellationRequested is a graceful stop.
 */

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "Unknown error";
}

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Innermost cause message, kept on the job for diagnostics. */
  rootCauseMessage(): string | undefined {
    let current: unknown = this.cause;
    let last: string | undefined;
    while (current !== undefined) {
      last = errorMessage(current);
      current = current instanceof Error ? current.cause : undefined;
    }
    return last;
  }
}

export class FetchError extends PipelineError {}

export class ProviderCallError extends PipelineError {}

export class ProviderTimeoutError extends ProviderCallError {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export class FrameCaptureError extends PipelineError {
  constructor(
    readonly timestamp: number,
    options?: { cause?: unknown }
  ) {
    super(`Failed to capture frame at ${timestamp.toFixed(3)}s`, options);
  }
}

export class TranslationMismatchError extends PipelineError {
  constructor(
    readonly batchIndex: number,
    readonly missingCueIndices: number[],
    readonly expectedCount: number
  ) {
    super(
      `Batch ${batchIndex}: ${missingCueIndices.length}/${expectedCount} translations missing, backfilled with source text`
    );
  }
}

export class CancellationRequested extends PipelineError {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} was cancelled`);
  }
}

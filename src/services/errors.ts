// Errors raised by the quiz pipeline and the persistence layer.
// Routes log these and collapse them to a generic 500.

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class VideoDownloadError extends PipelineError {}

export class TranscriptionError extends PipelineError {}

export class QuizGenerationError extends PipelineError {}

/** The model answered, but not with parseable JSON. */
export class QuizResponseParseError extends QuizGenerationError {}

/** Parseable JSON that does not have the required quiz shape. */
export class QuizStructureError extends QuizGenerationError {}

/** Postgres error code for a unique constraint violation. */
export const UNIQUE_VIOLATION = "23505";

export class StoreError extends Error {
  /** Postgres / PostgREST error code, when the database reported one. */
  readonly code?: string;

  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, options);
    this.name = "StoreError";
    this.code = options?.code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type AppErrorCode =
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'REQUEST_TIMEOUT'
  | 'SERVICE_UNAVAILABLE'
  | 'INTERNAL';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: AppErrorCode;
  public readonly details?: unknown;

  constructor(opts: { statusCode: number; code: AppErrorCode; message: string; details?: unknown }) {
    super(opts.message);
    this.name = 'AppError';
    this.statusCode = opts.statusCode;
    this.code = opts.code;
    this.details = opts.details;
  }
}

/** The whole request exceeded its budget; surfaced to the caller as 408. */
export class RequestTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super({
      statusCode: 408,
      code: 'REQUEST_TIMEOUT',
      message: `Request exceeded ${timeoutMs}ms timeout`,
    });
    this.name = 'RequestTimeoutError';
  }
}

/** A single pipeline stage ran past its sub-budget. Always caught by the stage owner. */
export class StageTimeoutError extends Error {
  public readonly stage: string;
  public readonly timeoutMs: number;

  constructor(stage: string, timeoutMs: number) {
    super(`${stage}_timeout after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
    this.stage = stage;
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type ScoutErrorCode = 'INPUT_ERROR' | 'FETCH_ERROR' | 'OUTPUT_ERROR' | 'SCORING_ERROR' | 'CONFIG_ERROR';

export class ScoutError extends Error {
  readonly code: ScoutErrorCode;
  readonly exitCode: number;

  constructor(code: ScoutErrorCode, message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

/** Unusable location string or command line. Nothing has been fetched yet. */
export class InputError extends ScoutError {
  constructor(message: string) {
    super('INPUT_ERROR', message, 2);
  }
}

export class FetchError extends ScoutError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, opts: { status?: number; cause?: unknown } = {}) {
    super('FETCH_ERROR', message, 1, { cause: opts.cause });
    this.url = url;
    this.status = opts.status;
  }
}

export class OutputError extends ScoutError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('OUTPUT_ERROR', `Could not write ${path}: ${errorMessage(cause)}`, 3, { cause });
    this.path = path;
  }
}

export class ScoringError extends ScoutError {
  constructor(message: string, cause?: unknown) {
    super('SCORING_ERROR', message, 1, { cause });
  }
}

export class ConfigError extends ScoutError {
  constructor(message: string) {
    super('CONFIG_ERROR', message, 2);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

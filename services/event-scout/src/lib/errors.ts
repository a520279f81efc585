export type ErrorKind =
  | 'NavigationError'
  | 'SearchUIError'
  | 'ExtractionSkipped'
  | 'ScoringDegraded'
  | 'StoreWriteConflict'
  | 'ModelResponseError'
  | 'InvalidRequest';

/**
 * Base class for every failure the search pipeline reports to callers.
 * `toString()` renders the `<Kind>: <message>` form used in error payloads.
 */
export abstract class EventScoutError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  override toString(): string {
    return `${this.kind}: ${this.message}`;
  }
}

export class NavigationError extends EventScoutError {
  readonly kind = 'NavigationError';

  constructor(readonly url: string, readonly attempts: number, options?: { cause?: unknown }) {
    super(`Failed to load ${url} after ${attempts} attempt(s)${describeCause(options?.cause)}`, options);
  }
}

export class SearchUIError extends EventScoutError {
  readonly kind = 'SearchUIError';
}

export class ExtractionSkipped extends EventScoutError {
  readonly kind = 'ExtractionSkipped';

  constructor(readonly url: string, reason: string, options?: { cause?: unknown }) {
    super(`${url}: ${reason}`, options);
  }
}

export class ScoringDegraded extends EventScoutError {
  readonly kind = 'ScoringDegraded';
}

export class StoreWriteConflict extends EventScoutError {
  readonly kind = 'StoreWriteConflict';
}

export class ModelResponseError extends EventScoutError {
  readonly kind = 'ModelResponseError';
}

export class InvalidRequest extends EventScoutError {
  readonly kind = 'InvalidRequest';
}

export interface ErrorPayload {
  success: false;
  error: string;
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof EventScoutError) {
    return { success: false, error: error.toString() };
  }
  return { success: false, error: `InternalError: ${errorMessage(error)}` };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeCause(cause: unknown): string {
  return cause === undefined ? '' : ` (${errorMessage(cause)})`;
}

/** HTTP status for a structured error payload, keyed by its `<Kind>:` prefix. */
export function statusForError(payload: ErrorPayload): 400 | 500 | 502 | 503 {
  const kind = payload.error.split(':', 1)[0];
  switch (kind) {
    case 'InvalidRequest':
      return 400;
    case 'NavigationError':
      return 502;
    case 'SearchUIError':
      return 503;
    default:
      return 500;
  }
}

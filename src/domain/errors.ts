/**
 * Error taxonomy for the dispatch pipeline.
 *
 * Every failure the library can observe is a `DispatchError` carrying a
 * `kind` discriminant and, where one exists, the underlying failure as
 * the standard `cause`.
 */

export type DispatchErrorKind =
  | 'transport'
  | 'request'
  | 'serialization'
  | 'io'
  | 'parse-uuid'
  | 'config'
  | 'init'
  | 'run';

/** Coarse grouping of a non-success HTTP status, used in log lines. */
export type StatusClass = 'Client' | 'Server' | 'Unknown';

const DESCRIPTIONS: Record<DispatchErrorKind, string> = {
  transport: 'Transport failure while sending payload',
  request: 'Unable to build collector request',
  serialization: 'Unable to serialize payload events',
  io: 'Unable to read collector response',
  'parse-uuid': 'Invalid UUID',
  config: 'Invalid configuration',
  init: 'Unable to initialise dispatcher',
  run: 'An error has occurred during run',
};

export interface DispatchErrorOptions {
  cause?: unknown;
  status?: number;
}

export class DispatchError extends Error {
  override readonly name = 'DispatchError';
  readonly kind: DispatchErrorKind;
  /** HTTP status for `run` errors. */
  readonly status: number | undefined;

  constructor(kind: DispatchErrorKind, detail?: string, options: DispatchErrorOptions = {}) {
    const base = DESCRIPTIONS[kind];
    super(detail ? `${base}: ${detail}` : base, { cause: options.cause });
    this.kind = kind;
    this.status = options.status;
  }

  /** Status class for `run` errors, undefined otherwise. */
  get statusClass(): StatusClass | undefined {
    return this.status === undefined ? undefined : classifyStatus(this.status);
  }
}

/** Client for 4xx, Server for 5xx, Unknown for anything else. */
export function classifyStatus(status: number): StatusClass {
  if (status >= 400 && status < 500) return 'Client';
  if (status >= 500 && status < 600) return 'Server';
  return 'Unknown';
}

export function isDispatchError(value: unknown, kind?: DispatchErrorKind): value is DispatchError {
  return value instanceof DispatchError && (kind === undefined || value.kind === kind);
}

/**
 * Wraps an arbitrary thrown value. Existing `DispatchError`s pass through
 * untouched so the innermost classification wins.
 */
export function toDispatchError(kind: DispatchErrorKind, err: unknown): DispatchError {
  if (err instanceof DispatchError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new DispatchError(kind, detail, { cause: err });
}

export type ChrFailureKind =
  | 'InvalidColorCode'
  | 'InvalidInputSize'
  | 'InputNotFound'
  | 'OutputAlreadyExists'
  | 'OutputDirMissing'
  | 'Usage';

export interface ChrFailure {
  kind: ChrFailureKind;
  message: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ChrFailure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: ChrFailureKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

// Thrown when a source runs dry mid-strip even though its size was validated up front.
export class StreamTruncationError extends Error {
  constructor(readonly offset: number, readonly expected: number, readonly got: number) {
    super(`CHR source truncated at offset ${offset}: expected ${expected} bytes, got ${got}`);
    this.name = 'StreamTruncationError';
  }
}

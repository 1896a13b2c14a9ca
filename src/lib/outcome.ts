/**
 * Failure values shared by every stage of the reader.
 *
 * Nothing in the pipeline throws on bad image data; each stage returns an
 * Outcome and the orchestrator branches on it.
 */

export type ReaderErrorKind = 'NotFound' | 'Format' | 'Checksum';

export interface ReaderError {
  readonly kind: ReaderErrorKind;
  readonly message: string;
}

export type Outcome<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: ReaderError };

/** A collaborator may answer synchronously or through a promise. */
export type Awaitable<T> = T | Promise<T>;

export function ok<T>(value: T): Outcome<T> {
  return { success: true, value };
}

export function fail<T>(kind: ReaderErrorKind, message: string): Outcome<T> {
  return { success: false, error: { kind, message } };
}

export function notFound<T>(message: string): Outcome<T> {
  return fail<T>('NotFound', message);
}

export class ReaderException extends Error {
  readonly kind: ReaderErrorKind;

  constructor(readonly error: ReaderError) {
    super(error.message);
    this.name = `${error.kind}Exception`;
    this.kind = error.kind;
  }
}

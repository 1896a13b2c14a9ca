/**
 * Options recognised by the reader. Keys it does not know travel in
 * `extra` and reach the collaborators untouched.
 */
export interface DecodeOptions {
  /** Prefer slower, more thorough search. Forced on when left undefined. */
  readonly tryHarder?: boolean;
  /** Skip detection and read the frame as a bare, axis-aligned symbol */
  readonly pureBarcode?: boolean;
  /** Character set hint, as an IANA name such as "UTF-8" or "Shift_JIS" */
  readonly characterSet?: string;
  readonly extra?: Readonly<Record<string, unknown>>;
}

/**
 * Copy the caller's options, turning try-harder on unless the caller set it.
 */
export function resolveDecodeOptions(options: DecodeOptions = {}): DecodeOptions {
  return {
    ...options,
    tryHarder: options.tryHarder ?? true,
  };
}

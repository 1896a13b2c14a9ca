/**
 * Contracts for the two external collaborators of the reader: a detector
 * that finds and rectifies a symbol, and a decoder that turns a rectified
 * bit grid into text.
 */

import type { BitMatrix } from './bit-matrix';
import type { DecodeOptions } from './decode-options';
import type { Awaitable, Outcome } from './outcome';

export interface GeometryPoint {
  x: number;
  y: number;
}

export interface StructuredAppendInfo {
  /** Symbol position byte: index in the high nibble, count - 1 in the low one */
  sequenceNumber: number;
  parity: number;
}

/**
 * What the payload decoder hands back for one bit grid.
 */
export interface DecodedPayload {
  text: string;
  rawBytes: Uint8Array;
  byteSegments?: Uint8Array[];
  ecLevel?: string;
  structuredAppend?: StructuredAppendInfo;
  metadata?: QrDecoderMetaData;
}

/**
 * Extra facts the decoder learned while reading, currently whether the
 * symbol was read from its mirror image.
 */
export class QrDecoderMetaData {
  constructor(private readonly mirrored: boolean) {}

  isMirrored(): boolean {
    return this.mirrored;
  }

  /**
   * For a mirrored symbol, swap the bottom-left and top-right finder points
   * (indices 0 and 2). The input array is left as it is.
   */
  applyMirroredCorrection(points: readonly GeometryPoint[]): GeometryPoint[] {
    const corrected = points.map(p => ({ ...p }));
    if (!this.mirrored || corrected.length < 3) {
      return corrected;
    }
    [corrected[0], corrected[2]] = [corrected[2], corrected[0]];
    return corrected;
  }
}

export interface DetectorResult {
  bits: BitMatrix;
  points: GeometryPoint[];
}

export interface Detector {
  /** Fails with NotFound */
  detect(image: BitMatrix, options: DecodeOptions): Awaitable<Outcome<DetectorResult>>;
}

export interface PayloadDecoder {
  /** Fails with Format or Checksum */
  decode(bits: BitMatrix, options: DecodeOptions): Awaitable<Outcome<DecodedPayload>>;
}

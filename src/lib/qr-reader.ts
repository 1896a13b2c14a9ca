/**
 * QR code reader: picks an extraction strategy, runs the payload decoder
 * and assembles the result, retrying once in pure-barcode mode.
 */

import type { BitMatrix } from './bit-matrix';
import type { DecodedPayload, Detector, GeometryPoint, PayloadDecoder } from './collaborators';
import { debugLog } from './debug';
import { resolveDecodeOptions, type DecodeOptions } from './decode-options';
import { ok, ReaderException, type Outcome } from './outcome';
import { extractPureBits } from './pure-bits';
import { createZXingDecoder, createZXingDetector } from './zxing-collaborators';

export interface ResultMetadata {
  byteSegments?: Uint8Array[];
  errorCorrectionLevel?: string;
  structuredAppendSequence?: number;
  structuredAppendParity?: number;
}

export interface DecodeResult {
  text: string;
  rawBytes: Uint8Array;
  /** Located finder points; empty when the pure-barcode path was used */
  points: GeometryPoint[];
  format: 'QRCode';
  metadata: ResultMetadata;
}

export interface QrCodeReaderDeps {
  detector?: Detector;
  decoder?: PayloadDecoder;
}

/**
 * The reader keeps one detector and one decoder for its lifetime. Neither
 * may hold per-call state, so overlapping `decode` calls on one reader are
 * safe; a reader is not meant to be shared across worker threads.
 */
export class QrCodeReader {
  private readonly detector: Detector;
  private readonly decoder: PayloadDecoder;

  constructor(deps: QrCodeReaderDeps = {}) {
    this.detector = deps.detector ?? createZXingDetector();
    this.decoder = deps.decoder ?? createZXingDecoder();
  }

  getDecoder(): PayloadDecoder {
    return this.decoder;
  }

  /**
   * Locate and decode a QR code. When the first attempt fails and pure
   * mode was not asked for, a second attempt reads the frame as a pure
   * barcode; if that also fails, the first attempt's error is returned.
   */
  async decode(image: BitMatrix, options?: DecodeOptions): Promise<Outcome<DecodeResult>> {
    const resolved = resolveDecodeOptions(options);

    const first = await this.decodeInternal(image, resolved);
    if (first.success) {
      return first;
    }
    debugLog('ATTEMPT 1 - Failed', first.error);

    if (resolved.pureBarcode === true) {
      return first;
    }

    let second: Outcome<DecodeResult>;
    try {
      second = await this.decodeInternal(image, { ...resolved, pureBarcode: true });
    } catch (err) {
      debugLog('ATTEMPT 2 - Threw, reporting first error', err);
      return first;
    }
    if (second.success) {
      return second;
    }
    debugLog('ATTEMPT 2 - Failed, reporting first error', second.error);

    return first;
  }

  async decodeOrThrow(image: BitMatrix, options?: DecodeOptions): Promise<DecodeResult> {
    const outcome = await this.decode(image, options);
    if (!outcome.success) {
      throw new ReaderException(outcome.error);
    }
    return outcome.value;
  }

  reset(): void {
    // nothing cached between calls
  }

  private async decodeInternal(image: BitMatrix, options: DecodeOptions): Promise<Outcome<DecodeResult>> {
    let bits: BitMatrix;
    let points: GeometryPoint[];

    if (options.pureBarcode === true) {
      const extracted = extractPureBits(image);
      if (!extracted.success) {
        return extracted;
      }
      bits = extracted.value;
      points = [];
    } else {
      const detected = await this.detector.detect(image, options);
      if (!detected.success) {
        return detected;
      }
      bits = detected.value.bits;
      points = detected.value.points;
    }

    const decoded = await this.decoder.decode(bits, options);
    if (!decoded.success) {
      return decoded;
    }
    const payload = decoded.value;

    if (payload.metadata) {
      points = payload.metadata.applyMirroredCorrection(points);
    }

    debugLog('RESULT', { pure: options.pureBarcode === true, text: payload.text, points });

    return ok<DecodeResult>({
      text: payload.text,
      rawBytes: payload.rawBytes,
      points,
      format: 'QRCode',
      metadata: buildMetadata(payload),
    });
  }
}

function buildMetadata(payload: DecodedPayload): ResultMetadata {
  const metadata: ResultMetadata = {};
  if (payload.byteSegments) {
    metadata.byteSegments = payload.byteSegments;
  }
  if (payload.ecLevel !== undefined) {
    metadata.errorCorrectionLevel = payload.ecLevel;
  }
  if (payload.structuredAppend) {
    metadata.structuredAppendSequence = payload.structuredAppend.sequenceNumber;
    metadata.structuredAppendParity = payload.structuredAppend.parity;
  }
  return metadata;
}

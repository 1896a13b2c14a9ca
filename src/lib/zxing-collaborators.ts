/**
 * Detector and payload decoder backed by zxing-wasm.
 *
 * Both render a BitMatrix back into RGBA pixels and hand it to the
 * WebAssembly reader. The default reader loads the .wasm binary that ships
 * inside the installed zxing-wasm package, never the CDN copy.
 */

import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { prepareZXingModule, readBarcodes, type ReaderOptions, type ReadResult } from 'zxing-wasm/reader';
import { BitMatrix } from './bit-matrix';
import { debugLog } from './debug';
import type { DecodeOptions } from './decode-options';
import {
  QrDecoderMetaData,
  type DecodedPayload,
  type Detector,
  type DetectorResult,
  type GeometryPoint,
  type PayloadDecoder,
} from './collaborators';
import { fail, notFound, ok, type Outcome } from './outcome';

/** The part of a zxing-wasm result the collaborators read */
export type ZXingReadResult = Pick<
  ReadResult,
  | 'text'
  | 'bytes'
  | 'position'
  | 'isValid'
  | 'error'
  | 'ecLevel'
  | 'isMirrored'
  | 'sequenceIndex'
  | 'sequenceSize'
  | 'sequenceId'
  | 'symbol'
>;

export type ZXingReadFn = (image: ImageData, options: ReaderOptions) => Promise<ZXingReadResult[]>;

/** One byte of luminance per module, as zxing-wasm returns a symbol */
export type ZXingSymbol = ReadResult['symbol'];

export interface ZXingCollaboratorOptions {
  /** Pixels per module when rendering a matrix for the reader */
  scale?: number;
  /** Light modules added on every side */
  quietZone?: number;
  /** Luminance below which a returned symbol module counts as dark */
  threshold?: number;
  read?: ZXingReadFn;
}

export const DEFAULT_DETECTOR_OPTIONS = {
  scale: 1,
  quietZone: 0,
  threshold: 128,
} as const;

export const DEFAULT_DECODER_OPTIONS = {
  scale: 4,
  quietZone: 4,
  threshold: 128,
} as const;

// zxing-wasm spells character sets after zxing-cpp's enum
const CHARACTER_SETS: Record<string, NonNullable<ReaderOptions['characterSet']>> = {
  'utf-8': 'UTF8',
  utf8: 'UTF8',
  'iso-8859-1': 'ISO8859_1',
  latin1: 'ISO8859_1',
  'us-ascii': 'ASCII',
  ascii: 'ASCII',
  shift_jis: 'Shift_JIS',
  sjis: 'Shift_JIS',
  gb18030: 'GB18030',
  big5: 'Big5',
  'euc-kr': 'EUC_KR',
  'utf-16be': 'UTF16BE',
};

export function toZXingCharacterSet(name: string | undefined): ReaderOptions['characterSet'] {
  return name === undefined ? undefined : CHARACTER_SETS[name.toLowerCase()];
}

export function bitMatrixToImageData(
  matrix: BitMatrix,
  { scale = 1, quietZone = 0 }: { scale?: number; quietZone?: number } = {}
): ImageData {
  const width = (matrix.width + 2 * quietZone) * scale;
  const height = (matrix.height + 2 * quietZone) * scale;
  const data = new Uint8ClampedArray(width * height * 4).fill(255);

  for (let y = 0; y < matrix.height; y++) {
    for (let x = 0; x < matrix.width; x++) {
      if (!matrix.get(x, y)) continue;
      for (let sy = 0; sy < scale; sy++) {
        for (let sx = 0; sx < scale; sx++) {
          const px = (x + quietZone) * scale + sx;
          const py = (y + quietZone) * scale + sy;
          const idx = (py * width + px) * 4;
          data[idx] = 0;
          data[idx + 1] = 0;
          data[idx + 2] = 0;
        }
      }
    }
  }

  return { data, width, height, colorSpace: 'srgb' };
}

export function symbolToBitMatrix(symbol: ZXingSymbol, threshold = 128): BitMatrix {
  const matrix = new BitMatrix(symbol.width, symbol.height);
  for (let y = 0; y < symbol.height; y++) {
    for (let x = 0; x < symbol.width; x++) {
      if (symbol.data[y * symbol.width + x] < threshold) {
        matrix.set(x, y);
      }
    }
  }
  return matrix;
}

// Reader switches a caller may pass through `DecodeOptions.extra`
const FORWARDED_FLAGS = ['tryRotate', 'tryInvert', 'tryDownscale'] as const satisfies readonly (keyof ReaderOptions)[];

type ForwardedFlag = (typeof FORWARDED_FLAGS)[number];

export function forwardedReaderFlags(extra: DecodeOptions['extra']): Pick<ReaderOptions, ForwardedFlag> {
  const flags: Pick<ReaderOptions, ForwardedFlag> = {};
  if (!extra) return flags;
  for (const key of FORWARDED_FLAGS) {
    const value = extra[key];
    if (typeof value === 'boolean') {
      flags[key] = value;
    }
  }
  return flags;
}

export function readerOptions(options: DecodeOptions, overrides: ReaderOptions = {}): ReaderOptions {
  return {
    formats: ['QRCode'],
    tryHarder: options.tryHarder ?? true,
    tryRotate: true,
    tryInvert: false,
    maxNumberOfSymbols: 1,
    characterSet: toZXingCharacterSet(options.characterSet),
    ...forwardedReaderFlags(options.extra),
    ...overrides,
  };
}

let localModule: Promise<void> | null = null;

/** Hand zxing-wasm the reader binary from its own installed package, once */
export function prepareLocalZXingModule(): Promise<void> {
  if (!localModule) {
    localModule = (async () => {
      const resolveFromHere = createRequire(import.meta.url).resolve;
      const file = await readFile(resolveFromHere('zxing-wasm/reader/zxing_reader.wasm'));
      const wasmBinary = new Uint8Array(file).buffer;
      prepareZXingModule({ overrides: { wasmBinary } });
      debugLog('ZXING - Local module', { bytes: wasmBinary.byteLength });
    })();
    // let a failed load be retried on the next read
    localModule.catch(() => {
      localModule = null;
    });
  }
  return localModule;
}

export const readLocalBarcodes: ZXingReadFn = async (image, options) => {
  await prepareLocalZXingModule();
  return readBarcodes(image, options);
};

/**
 * Locate a QR symbol anywhere in the matrix. Points come back in finder
 * order: bottom-left, top-left, top-right, then the fourth corner.
 */
export function createZXingDetector(config: ZXingCollaboratorOptions = {}): Detector {
  const {
    scale = DEFAULT_DETECTOR_OPTIONS.scale,
    quietZone = DEFAULT_DETECTOR_OPTIONS.quietZone,
    threshold = DEFAULT_DETECTOR_OPTIONS.threshold,
    read = readLocalBarcodes,
  } = config;

  return {
    async detect(image, options): Promise<Outcome<DetectorResult>> {
      const imageData = bitMatrixToImageData(image, { scale, quietZone });
      const results = await read(imageData, readerOptions(options, {}));
      const found = results[0];

      if (!found || !found.symbol || found.symbol.width <= 0 || found.symbol.height <= 0) {
        debugLog('DETECT - No symbol', { results: results.length });
        return notFound('No QR code found in image');
      }

      // Positions refer to the rendered image; map them back to matrix pixels
      const toMatrix = (p: { x: number; y: number }): GeometryPoint => ({
        x: p.x / scale - quietZone,
        y: p.y / scale - quietZone,
      });
      const pos = found.position;
      const points = [pos.bottomLeft, pos.topLeft, pos.topRight, pos.bottomRight].map(toMatrix);

      debugLog('DETECT - Symbol', { size: `${found.symbol.width}x${found.symbol.height}`, points });

      return ok({ bits: symbolToBitMatrix(found.symbol, threshold), points });
    },
  };
}

/**
 * Decode an already rectified bit grid by rendering it as a pure symbol.
 */
export function createZXingDecoder(config: ZXingCollaboratorOptions = {}): PayloadDecoder {
  const {
    scale = DEFAULT_DECODER_OPTIONS.scale,
    quietZone = DEFAULT_DECODER_OPTIONS.quietZone,
    read = readLocalBarcodes,
  } = config;

  return {
    async decode(bits, options): Promise<Outcome<DecodedPayload>> {
      const imageData = bitMatrixToImageData(bits, { scale, quietZone });
      const results = await read(imageData, readerOptions(options, { isPure: true, returnErrors: true }));
      const found = results[0];

      if (!found) {
        return fail('Format', `No QR code structure in ${bits.width}x${bits.height} grid`);
      }
      if (!found.isValid) {
        debugLog('DECODE - Invalid symbol', found.error);
        return /checksum/i.test(found.error)
          ? fail('Checksum', found.error)
          : fail('Format', found.error || 'Unreadable QR code');
      }

      return ok(toDecodedPayload(found));
    },
  };
}

export function toDecodedPayload(found: ZXingReadResult): DecodedPayload {
  const payload: DecodedPayload = {
    text: found.text,
    rawBytes: found.bytes,
    metadata: new QrDecoderMetaData(found.isMirrored),
  };
  if (found.ecLevel) {
    payload.ecLevel = found.ecLevel;
  }
  if (found.sequenceIndex >= 0 && found.sequenceSize > 0) {
    const parity = Number.parseInt(found.sequenceId, 10);
    if (!Number.isNaN(parity)) {
      payload.structuredAppend = {
        sequenceNumber: (found.sequenceIndex << 4) | (found.sequenceSize - 1),
        parity,
      };
    }
  }
  return payload;
}

export { BitMatrix, type PixelPoint } from './lib/bit-matrix';
export {
  QrDecoderMetaData,
  type DecodedPayload,
  type Detector,
  type DetectorResult,
  type GeometryPoint,
  type PayloadDecoder,
  type StructuredAppendInfo,
} from './lib/collaborators';
export { isDebugMode, setDebugMode } from './lib/debug';
export { resolveDecodeOptions, type DecodeOptions } from './lib/decode-options';
export { DARK_VOTE_PERCENT, sampleModule } from './lib/grid-sampler';
export {
  estimateModuleSize,
  moduleSizeFromDiagonal,
  moduleSizeOneWay,
  type ScanAxis,
} from './lib/module-size';
export {
  fail,
  notFound,
  ok,
  ReaderException,
  type Awaitable,
  type Outcome,
  type ReaderError,
  type ReaderErrorKind,
} from './lib/outcome';
export {
  extractPureBits,
  measurePureGrid,
  MIN_MODULE_COUNT,
  squareUpDimensions,
  type PureGridGeometry,
} from './lib/pure-bits';
export {
  QrCodeReader,
  type DecodeResult,
  type QrCodeReaderDeps,
  type ResultMetadata,
} from './lib/qr-reader';
export { scanTransitions, type Direction, type TransitionScan } from './lib/transitions';
export {
  bitMatrixToImageData,
  createZXingDecoder,
  createZXingDetector,
  prepareLocalZXingModule,
  readerOptions,
  readLocalBarcodes,
  symbolToBitMatrix,
  toZXingCharacterSet,
  type ZXingCollaboratorOptions,
  type ZXingReadFn,
  type ZXingReadResult,
  type ZXingSymbol,
} from './lib/zxing-collaborators';

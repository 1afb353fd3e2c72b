export {
  ARCHIVE_FILENAME,
  buildPortraitArchive,
  MAIN_PORTRAIT_FILENAME,
  portraitFileName,
} from "./archive.js";
export { cropRegions, expandBox, extractRegion } from "./cropper.js";
export {
  CascadeFaceDetector,
  type CascadeDetectorOptions,
  type LoadedOpenCv,
  loadOpenCvRuntime,
  type OpenCvRuntime,
} from "./detectors/cascade-detector.js";
export { findCascadeFile } from "./detectors/cascade-model-path.js";
export {
  createFaceDetector,
  type DetectorBackendSetting,
  type DetectorConfig,
  resolveDetectorBackend,
} from "./detectors/factory.js";
export {
  HumanFaceDetector,
  type HumanDetectorOptions,
  type HumanRuntime,
  isHumanAvailable,
  loadHumanRuntime,
} from "./detectors/human-detector.js";
export type { FaceDetector } from "./detectors/types.js";
export {
  BackendUnavailableError,
  DecodeError,
  InvalidOptionsError,
  PortraitExtractionError,
} from "./errors.js";
export { boxArea, boxHeight, boxWidth, clipBox } from "./geometry.js";
export {
  decodeImage,
  DEFAULT_JPEG_QUALITY,
  encodeJpeg,
  encodePng,
} from "./image.js";
export {
  type ExtractionOptions,
  type ExtractionOptionsInput,
  extractionOptionsSchema,
  parseExtractionOptions,
  toSelectionMode,
} from "./options.js";
export { type DrawDetectionsOptions, drawDetections } from "./overlay.js";
export {
  type ExtractionDeps,
  type ExtractionOutcome,
  type ExtractionResult,
  extractPortraits,
  type Portrait,
  type SelectedDetection,
} from "./pipeline.js";
export { selectDetections } from "./selection.js";
export type {
  BoundingBox,
  Detection,
  DetectorBackend,
  RgbImage,
  SelectionMode,
} from "./types.js";
export * from "./logging/index.js";

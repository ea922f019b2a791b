/**
 * Utility exports
 */

// Ordering and selection
export { extractOrderingKey } from "./extract-ordering-key";
export { compareSlides } from "./compare-slides";
export { parseRange, selectionIndices } from "./parse-range";
export type { RangeSelection } from "./parse-range";

// Filesystem utilities
export { fileExists, fileSize, withExtension } from "./fs";

// Process and document utilities
export { runProcess, ProcessTimeoutError } from "./run-process";
export { rasterizePdf } from "./rasterize-pdf";
export { readDeck } from "./read-deck";
export { wrapWords } from "./wrap-words";

// Concurrency
export { runPool } from "./worker-pool";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";

// Template utilities
export { loadTemplate } from "./load-template";
export { scaffoldSlides } from "./scaffold-slides";

// Errors
export {
  SlideforgeError,
  InputError,
  AggregateFailure,
  CancellationError,
  BridgeError,
  errorMessage,
} from "./errors";

// Classes
export { Tracker, mapRenderError } from "./tracker";
export { ArtifactStore } from "./artifact-store";
export { Logger } from "./logger";

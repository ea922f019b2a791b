/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  InputConfig,
  OutputConfig,
  OutputFormat,
  RenderConfig,
  RenderBackend,
  BridgeConfig,
  LogLevel,
  LoggingConfig,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Slides
export type {
  SlideInput,
  SlideSet,
  RenderTask,
  ArtifactKind,
  ArtifactHandle,
  RenderFailureReason,
  MergeFailureReason,
  RenderSuccess,
  RenderFailure,
  RenderResult,
} from "./slides";

// Pipeline
export type {
  Renderer,
  RenderCallOptions,
  OutputSink,
  ProgressEvent,
  AggregatorOptions,
} from "./pipeline";

// Context
export type {
  ConversionContext,
  ConversionResult,
  FailureStage,
  FailureReason,
  FailureEntry,
  AggregationReport,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";

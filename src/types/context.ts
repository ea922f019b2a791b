/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { SlideSet } from "./slides";
import type { ProgressEvent } from "./pipeline";
import type { Logger } from "../utils/logger";
import type { AggregationReport } from "../utils/tracker";

// Re-export types from tracker
export type {
  FailureStage,
  FailureReason,
  FailureEntry,
  AggregationReport,
} from "../utils/tracker";

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  logger: Logger;
  range?: string; // Range spec ("3", "2-4", "1,3,5")
  signal?: AbortSignal; // Aborted on user interrupt
  onProgress?: (event: ProgressEvent) => void;

  slides?: SlideSet; // Scanner output, range already applied
  outputPath?: string; // Final artifact path
}

export interface ConversionResult {
  outputPath: string;
  report: AggregationReport;
}

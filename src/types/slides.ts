/**
 * Slide-related type definitions
 */

export interface SlideInput {
  path: string; // Absolute path to the slide document
  filename: string; // Base name including extension (e.g., "page3.html")
  orderKey: number | null; // First digit run in the filename, null sorts last
  position: number; // 0-based position in the resolved slide set
}

/**
 * Ordered slides; the array order is the page order of the output
 */
export type SlideSet = readonly SlideInput[];

export interface RenderTask {
  index: number; // Position in the slide set being aggregated
  slide: SlideInput;
}

/**
 * Intermediate artifact formats
 * - pdf: single-page document, merged by the PDF sink
 * - png: full-frame image, placed by the deck sink
 */
export type ArtifactKind = "pdf" | "png";

export interface ArtifactHandle {
  id: string;
  index: number;
  kind: ArtifactKind;
  path: string; // File inside the run's artifact store
}

export type RenderFailureReason =
  | "timeout"
  | "not-found"
  | "cancelled"
  | "empty-output"
  | "engine-error";

export type MergeFailureReason = "merge-error";

export interface RenderSuccess {
  status: "success";
  index: number;
  artifact: ArtifactHandle;
}

export interface RenderFailure {
  status: "failure";
  index: number;
  reason: RenderFailureReason;
  details: string;
}

export type RenderResult = RenderSuccess | RenderFailure;

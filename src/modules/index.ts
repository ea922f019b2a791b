/**
 * Pipeline modules export
 */

export { scan, resolveSlides, selectRange } from "./resolver";
export { prepareOutput } from "./output";
export { invokeRender, RenderTimeoutError, RenderCancelledError } from "./invoker";
export { runSequential } from "./aggregator";
export { runParallel, assertWorkerCount } from "./parallel-aggregator";
export { pdfToDeck, deckToPdf } from "./bridge";
export type { BridgeResult } from "./bridge";
export { report } from "./report";

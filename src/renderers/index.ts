/**
 * Renderer exports
 */

import { BrowserRenderer } from "./browser";
import { LayoutEngineRenderer } from "./layout-engine";
import type { ArtifactKind, RenderConfig, Renderer } from "../types";

export { BrowserRenderer } from "./browser";
export { LayoutEngineRenderer } from "./layout-engine";

/**
 * Build the configured backend for the artifact kind the sink consumes
 */
export function createRenderer(
  config: RenderConfig,
  kind: ArtifactKind,
): Renderer {
  switch (config.backend) {
    case "browser":
      return new BrowserRenderer(kind, {
        width: config.width,
        height: config.height,
        timeout: config.timeout,
        settleDelay: config.settleDelay,
      });
    case "layout":
      return new LayoutEngineRenderer(kind, {
        command: config.layoutCommand,
        width: config.width,
        height: config.height,
        timeout: config.timeout,
      });
  }
}

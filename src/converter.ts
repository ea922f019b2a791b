/**
 * Converter - Pipeline orchestrator
 * Coordinates resolver, renderer, aggregator and sink with zero business logic
 */

import path from "node:path";
import * as modules from "./modules";
import { createRenderer } from "./renderers";
import { createSink } from "./sinks";
import { ArtifactStore, CancellationError } from "./utils";
import type {
  ArtifactKind,
  ConversionContext,
  ConversionResult,
  OutputFormat,
  OutputSink,
  RenderConfig,
  Renderer,
} from "./types";

export interface ConverterDependencies {
  createRenderer: (config: RenderConfig, kind: ArtifactKind) => Renderer;
  createSink: (format: OutputFormat, title?: string) => OutputSink;
  createStore: () => Promise<ArtifactStore>;
}

const defaultDependencies: ConverterDependencies = {
  createRenderer,
  createSink,
  createStore: () => ArtifactStore.create(),
};

export class Converter {
  private deps: ConverterDependencies;

  constructor(
    private ctx: ConversionContext,
    deps: Partial<ConverterDependencies> = {},
  ) {
    this.deps = { ...defaultDependencies, ...deps };
  }

  /**
   * Run the conversion pipeline
   * Input problems surface before the renderer is opened
   */
  async run(): Promise<ConversionResult> {
    const { ctx } = this;
    const { render, output } = ctx.config;

    const slides = await modules.scan(ctx);
    if (render.parallel) {
      modules.assertWorkerCount(render.workers);
    }
    const outputPath = await modules.prepareOutput(ctx);

    const sink = this.deps.createSink(output.format, path.parse(outputPath).name);
    const renderer = this.deps.createRenderer(render, sink.kind);
    const store = await this.deps.createStore();

    ctx.logger.debug(
      `Rendering ${slides.length} slide(s) with ${renderer.name} (${render.parallel ? `${render.workers} workers` : "sequential"})`,
    );

    try {
      await renderer.open();

      const options = {
        store,
        timeout: render.timeout,
        signal: ctx.signal,
        logger: ctx.logger,
        onProgress: ctx.onProgress,
      };
      const report = render.parallel
        ? await modules.runParallel(slides, renderer, sink, render.workers, options)
        : await modules.runSequential(slides, renderer, sink, options);

      if (ctx.signal?.aborted) {
        throw new CancellationError();
      }

      await sink.finalize(outputPath);
      ctx.logger.debug(`Wrote ${sink.pageCount} page(s) to ${outputPath}`);

      return { outputPath, report };
    } finally {
      try {
        await renderer.close();
      } finally {
        await store.dispose();
      }
    }
  }
}

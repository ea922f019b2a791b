/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  directory: z.string(),
  extension: z.string().startsWith("."),
});

export const OutputFormatSchema = z.enum(["pdf", "pptx"]);

export const OutputConfigSchema = z.object({
  directory: z.string(),
  filename: z.string().min(1),
  format: OutputFormatSchema,
  overwrite: z.boolean(),
});

export const RenderBackendSchema = z.enum(["browser", "layout"]);

export const RenderConfigSchema = z.object({
  backend: RenderBackendSchema,
  width: z.number().int().positive(), // Slide frame in CSS pixels
  height: z.number().int().positive(),
  timeout: z.number().int().positive(), // Per-slide deadline in milliseconds
  settleDelay: z.number().int().nonnegative(), // Extra wait after fonts are ready
  parallel: z.boolean(),
  // Not constrained here: the parallel aggregator rejects non-positive counts itself
  workers: z.number().int(),
  layoutCommand: z.string().min(1),
});

export const BridgeConfigSchema = z.object({
  dpi: z.number().int().positive(),
  converterCommand: z.string().min(1),
  converterTimeout: z.number().int().positive(),
});

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
  showProgress: z.boolean(),
});

export const ConversionConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  render: RenderConfigSchema,
  bridge: BridgeConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = z.object({
  input: InputConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  render: RenderConfigSchema.partial().optional(),
  bridge: BridgeConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// TypeScript types inferred from schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type RenderBackend = z.infer<typeof RenderBackendSchema>;
export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

/**
 * A user or custom config file that failed to load or validate
 */
export interface ConfigError {
  path: string;
  error: unknown;
}

/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const ConfluenceConfigSchema = z.object({
  baseUrl: z.string(),
  apiPath: z.string(),
  timeout: z.number().int().nonnegative(), // In milliseconds, 0 disables
});

export const RendererConfigSchema = z.object({
  engine: z.enum(["builtin", "vimdiff"]),
  colorScheme: z.string().min(1),
  layout: z.enum(["side-by-side", "line-by-line"]),
  vimdiffMinimumVersion: z.string().regex(/^\d+(\.\d+)*$/),
  // Handlebars page template for the builtin engine; null uses the default
  template: z.string().nullable(),
  timeout: z.number().int().nonnegative(),
});

export const BatchConfigSchema = z.object({
  pauseBetweenRows: z.boolean(),
  // Exit non-zero when any row fails, not only on precondition errors
  strict: z.boolean(),
  overwrite: z.enum(["prompt", "always", "never"]),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const DiffpressConfigSchema = z.object({
  confluence: ConfluenceConfigSchema,
  renderer: RendererConfigSchema,
  batch: BatchConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialDiffpressConfigSchema = z.object({
  confluence: ConfluenceConfigSchema.partial().optional(),
  renderer: RendererConfigSchema.partial().optional(),
  batch: BatchConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type ConfluenceConfig = z.infer<typeof ConfluenceConfigSchema>;
export type RendererConfig = z.infer<typeof RendererConfigSchema>;
export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type DiffpressConfig = z.infer<typeof DiffpressConfigSchema>;
export type PartialDiffpressConfig = z.infer<typeof PartialDiffpressConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}

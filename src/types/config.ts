/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  directory: z.string(),
  pattern: z.string(),
  ignore: z.array(z.string()),
  encoding: z.custom<BufferEncoding>(
    (value) => typeof value === "string" && Buffer.isEncoding(value),
    { message: "Unknown file encoding" },
  ),
});

// CSS selectors used to collect references and anchors from each page
export const ScannerConfigSchema = z.object({
  links: z.string().min(1),
  images: z.string().min(1),
  fragments: z.string().min(1),
});

export const ValidateConfigSchema = z.object({
  // Filename tried when a link points at a directory (e.g. "guide/")
  directoryIndex: z.string().min(1),
  checkDuplicateIds: z.boolean(),
});

export const IndexerConfigSchema = z.object({
  concurrency: z.number().int().positive(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const CheckConfigSchema = z.object({
  input: InputConfigSchema,
  scanner: ScannerConfigSchema,
  validate: ValidateConfigSchema,
  indexer: IndexerConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialCheckConfigSchema = CheckConfigSchema.partial().extend({
  input: InputConfigSchema.partial().optional(),
  scanner: ScannerConfigSchema.partial().optional(),
  validate: ValidateConfigSchema.partial().optional(),
  indexer: IndexerConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;
export type ValidateConfig = z.infer<typeof ValidateConfigSchema>;
export type IndexerConfig = z.infer<typeof IndexerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type CheckConfig = z.infer<typeof CheckConfigSchema>;
export type PartialCheckConfig = z.infer<typeof PartialCheckConfigSchema>;

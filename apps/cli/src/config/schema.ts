import { z } from 'zod';
import {
  DEFAULT_COLLECTION_FILE,
  DEFAULT_EXPORT_TITLE,
  ExportFormatSchema,
  ImportConflictPolicySchema,
} from '@lemmaledger/core';

// Where the collection lives, relative to the config file
export const CollectionConfigSchema = z.object({
  file: z.string().min(1).default(DEFAULT_COLLECTION_FILE),
});

// Applied by `lemma add` when the flags are omitted
export const DefaultsConfigSchema = z.object({
  category: z.string().optional(),
  tags: z.array(z.string()).default([]),
});

export const ImportConfigSchema = z.object({
  onConflict: ImportConflictPolicySchema.default('skip'),
});

export const ExportConfigSchema = z.object({
  format: ExportFormatSchema.default('markdown'),
  title: z.string().default(DEFAULT_EXPORT_TITLE),
});

// Output config
export const OutputConfigSchema = z.object({
  format: z.enum(['table', 'json']).default('table'),
  colors: z.boolean().default(true),
});

// Main config schema
export const LemmaConfigSchema = z.object({
  collection: CollectionConfigSchema.default({}),
  defaults: DefaultsConfigSchema.default({}),
  import: ImportConfigSchema.default({}),
  export: ExportConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
});

// Types
export type CollectionConfig = z.infer<typeof CollectionConfigSchema>;
export type DefaultsConfig = z.infer<typeof DefaultsConfigSchema>;
export type ImportConfig = z.infer<typeof ImportConfigSchema>;
export type ExportConfig = z.infer<typeof ExportConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type LemmaConfig = z.infer<typeof LemmaConfigSchema>;
export type LemmaConfigInput = z.input<typeof LemmaConfigSchema>;

// Helper to define config with defaults filled in
export function defineConfig(config: LemmaConfigInput): LemmaConfig {
  return LemmaConfigSchema.parse(config);
}

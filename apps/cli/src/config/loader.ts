import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { ZodError } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { LemmaConfigSchema, type LemmaConfig } from './schema.js';

export const CONFIG_FILES = ['lemma.config.json', '.lemmarc.json', '.lemmarc'];

export interface LoadConfigResult {
  config: LemmaConfig;
  configPath: string | null;
}

export async function loadConfig(cwd: string = process.cwd()): Promise<LoadConfigResult> {
  const configPath = getConfigPath(cwd);

  if (!configPath) {
    // Return default config if no file found
    return {
      config: LemmaConfigSchema.parse({}),
      configPath: null,
    };
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const raw: unknown = JSON.parse(content);
    return {
      config: LemmaConfigSchema.parse(raw),
      configPath,
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const validationError = fromZodError(error, {
        prefix: 'Configuration error',
        prefixSeparator: ': ',
      });
      throw new Error(`Invalid config in ${configPath}:\n\n${validationError.message}`);
    }

    if (error instanceof SyntaxError) {
      throw new Error(
        `Invalid JSON in ${configPath}: ${error.message}\n\nCheck for missing commas, trailing commas, or unquoted keys.`,
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load config from ${configPath}: ${message}`);
  }
}

export function getConfigPath(cwd: string = process.cwd()): string | null {
  for (const filename of CONFIG_FILES) {
    const fullPath = resolve(cwd, filename);
    if (existsSync(fullPath)) {
      return fullPath;
    }
  }
  return null;
}

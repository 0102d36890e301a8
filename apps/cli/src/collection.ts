import { dirname, resolve } from "path";
import { loadStore, saveStore, type LemmaStore } from "@lemmaledger/core";
import { loadConfig } from "./config/loader.js";
import type { LemmaConfig } from "./config/schema.js";
import { configureOutput } from "./output/reporters.js";

export interface CollectionOptions {
  /** Overrides `collection.file` from the config */
  file?: string;
}

export interface OpenCollection {
  store: LemmaStore;
  path: string;
  config: LemmaConfig;
}

/**
 * Load the config and the collection it points at. A missing collection
 * file opens as an empty store.
 */
export async function openCollection(
  options: CollectionOptions = {},
  cwd: string = process.cwd(),
): Promise<OpenCollection> {
  const { config, configPath } = await loadConfig(cwd);
  configureOutput(config.output);

  const path = options.file
    ? resolve(cwd, options.file)
    : resolve(configPath ? dirname(configPath) : cwd, config.collection.file);

  return { store: await loadStore(path), path, config };
}

/**
 * Persist the store if the command changed it
 */
export async function saveCollection(collection: OpenCollection): Promise<boolean> {
  return saveStore(collection.path, collection.store);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

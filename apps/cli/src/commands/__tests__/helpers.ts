// apps/cli/src/commands/__tests__/helpers.ts
import { Command } from "commander";
import { vol } from "memfs";
import { LemmaStore, readCollectionFile } from "@lemmaledger/core";
import { LemmaConfigSchema, type LemmaConfig, type LemmaConfigInput } from "../../config/schema.js";

export const COLLECTION_FILE = "/work/lemmas.json";

// Helper to create a test program around one command
export function createTestProgram(command: Command): Command {
  const program = new Command();
  program.exitOverride(); // Prevent process.exit
  program.configureOutput({
    writeErr: () => {}, // Suppress error output
    writeOut: () => {}, // Suppress output
  });
  program.addCommand(command);
  return program;
}

export function createMockConfig(overrides: LemmaConfigInput = {}): LemmaConfig {
  return LemmaConfigSchema.parse(overrides);
}

export function fixedClock(): () => Date {
  return () => new Date("2024-01-01T00:00:00.000Z");
}

/**
 * Build a store, then write it where the commands will look for it
 */
export function seedCollection(build: (store: LemmaStore) => void, path = COLLECTION_FILE): void {
  const store = new LemmaStore({ now: fixedClock() });
  build(store);
  vol.fromJSON({ [path]: JSON.stringify(store.toPayload()) });
}

export async function readStore(path = COLLECTION_FILE): Promise<LemmaStore> {
  const payload = await readCollectionFile(path);
  if (!payload) {
    throw new Error(`No collection at ${path}`);
  }
  return LemmaStore.fromPayload(payload);
}

export function run(program: Command, ...args: string[]): Promise<Command> {
  return program.parseAsync(["node", "test", ...args, "--file", COLLECTION_FILE]);
}

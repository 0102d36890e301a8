import { Command } from "commander";
import {
  createAddCommand,
  createShowCommand,
  createListCommand,
  createUpdateCommand,
  createDeleteCommand,
  createLinkCommand,
  createUnlinkCommand,
  createDepsCommand,
  createSearchCommand,
  createExportCommand,
  createImportCommand,
  createStatsCommand,
  createDoctorCommand,
  createGraphCommand,
  createDemoCommand,
} from "./commands/index.js";

export function createCli(): Command {
  const program = new Command();

  program
    .name("lemma")
    .description("Keep track of lemmas, their proofs and what depends on what")
    .version("0.1.0");

  // Records
  program.addCommand(createAddCommand());
  program.addCommand(createShowCommand());
  program.addCommand(createListCommand());
  program.addCommand(createUpdateCommand());
  program.addCommand(createDeleteCommand());

  // Dependencies
  program.addCommand(createLinkCommand());
  program.addCommand(createUnlinkCommand());
  program.addCommand(createDepsCommand());
  program.addCommand(createDoctorCommand());
  program.addCommand(createGraphCommand());

  // Queries and file exchange
  program.addCommand(createSearchCommand());
  program.addCommand(createStatsCommand());
  program.addCommand(createExportCommand());
  program.addCommand(createImportCommand());
  program.addCommand(createDemoCommand());

  return program;
}

// Re-export config utilities for user config files
export { defineConfig } from "./config/schema.js";
export type { LemmaConfig, LemmaConfigInput } from "./config/schema.js";

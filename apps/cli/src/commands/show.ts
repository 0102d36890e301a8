import { Command, Option } from "commander";
import { ExportFormatSchema, renderLemma, type ExportFormat } from "@lemmaledger/core";
import { openCollection, describeError } from "../collection.js";
import { error } from "../output/reporters.js";

interface ShowOptions {
  file?: string;
  format: ExportFormat;
}

export function createShowCommand(): Command {
  return new Command("show")
    .description("Show a single lemma")
    .argument("<id>", "Lemma id")
    .option("-f, --file <path>", "Lemma collection file")
    .addOption(
      new Option("--format <format>", "Output format")
        .choices(ExportFormatSchema.options)
        .default("text"),
    )
    .action(async (id: string, options: ShowOptions) => {
      try {
        const { store } = await openCollection(options);
        console.log(renderLemma(store.require(id), options.format).trimEnd());
      } catch (err) {
        error(describeError(err));
        process.exit(1);
      }
    });
}

import { Command, Option } from "commander";
import { mkdir, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { ExportFormatSchema, renderCollection, type ExportFormat } from "@lemmaledger/core";
import { openCollection, describeError } from "../collection.js";
import { error, spinner, success } from "../output/reporters.js";

interface ExportOptions {
  file?: string;
  format?: ExportFormat;
  output?: string;
  title?: string;
}

export function createExportCommand(): Command {
  return new Command("export")
    .description("Export the whole collection")
    .option("-f, --file <path>", "Lemma collection file")
    .addOption(
      new Option("--format <format>", "Export format (default from config)").choices(
        ExportFormatSchema.options,
      ),
    )
    .option("-o, --output <path>", "Write to a file instead of stdout")
    .option("--title <title>", "Document title for Markdown and LaTeX")
    .action(async (options: ExportOptions) => {
      const spin = spinner("Exporting lemmas...");

      try {
        const { store, config } = await openCollection(options);
        const format = options.format ?? config.export.format;
        const content = renderCollection(store.records(), format, {
          title: options.title ?? config.export.title,
          metadata: store.getMetadata(),
        });

        if (!options.output) {
          spin.stop();
          console.log(content.trimEnd());
          return;
        }

        const outputPath = resolve(process.cwd(), options.output);
        await mkdir(dirname(outputPath), { recursive: true });
        await writeFile(outputPath, content, "utf-8");
        spin.stop();
        success(`Exported ${store.size} lemma(s) as ${format} to ${outputPath}`);
      } catch (err) {
        spin.stop();
        error(`Export failed: ${describeError(err)}`);
        process.exit(1);
      }
    });
}

import { Command, Option } from "commander";
import { resolve } from "path";
import {
  ImportConflictPolicySchema,
  importCollectionFile,
  type ImportConflictPolicy,
} from "@lemmaledger/core";
import { openCollection, saveCollection, describeError } from "../collection.js";
import { error, json, keyValue, setJsonMode, spinner, success } from "../output/reporters.js";

interface ImportOptions {
  file?: string;
  onConflict?: ImportConflictPolicy;
  json?: boolean;
}

export function createImportCommand(): Command {
  return new Command("import")
    .description("Merge lemmas from another collection file")
    .argument("<source>", "Collection file to import")
    .option("-f, --file <path>", "Lemma collection file")
    .addOption(
      new Option("--on-conflict <policy>", "What to do with ids that already exist").choices(
        ImportConflictPolicySchema.options,
      ),
    )
    .option("--json", "Output the import summary as JSON")
    .action(async (source: string, options: ImportOptions) => {
      if (options.json) {
        setJsonMode(true);
      }
      const spin = spinner(`Importing ${source}...`);

      try {
        const collection = await openCollection(options);
        const onConflict = options.onConflict ?? collection.config.import.onConflict;
        const result = await importCollectionFile(
          collection.store,
          resolve(process.cwd(), source),
          { onConflict },
        );
        await saveCollection(collection);
        spin.stop();

        if (options.json || collection.config.output.format === "json") {
          json(result);
          return;
        }

        const renumbered = Object.entries(result.renumbered);
        const total = result.added.length + result.replaced.length + renumbered.length;
        success(`Imported ${total} lemma(s) from ${source}`);
        keyValue("Added", String(result.added.length), 1);
        keyValue("Replaced", String(result.replaced.length), 1);
        keyValue("Skipped", String(result.skipped.length), 1);
        keyValue("Renumbered", renumbered.map(([from, to]) => `${from} -> ${to}`).join(", ") || "0", 1);
      } catch (err) {
        spin.stop();
        error(`Import failed: ${describeError(err)}`);
        process.exit(1);
      }
    });
}

import { Command } from "commander";
import { openCollection, describeError } from "../collection.js";
import { error, info, json, setJsonMode } from "../output/reporters.js";
import { formatLemmaTable } from "../output/formatters.js";

interface ListOptions {
  file?: string;
  json?: boolean;
}

export function createListCommand(): Command {
  return new Command("list")
    .description("List every lemma in the collection")
    .option("-f, --file <path>", "Lemma collection file")
    .option("--json", "Output as JSON")
    .action(async (options: ListOptions) => {
      if (options.json) {
        setJsonMode(true);
      }

      try {
        const { store, config } = await openCollection(options);

        if (options.json || config.output.format === "json") {
          json(store.list());
          return;
        }

        if (store.size === 0) {
          info("The collection is empty. Add one with `lemma add <statement>`.");
          return;
        }
        console.log(formatLemmaTable(store.records()));
      } catch (err) {
        error(describeError(err));
        process.exit(1);
      }
    });
}

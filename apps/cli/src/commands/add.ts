import { Command } from "commander";
import { openCollection, saveCollection, describeError } from "../collection.js";
import { error, json, setJsonMode, success } from "../output/reporters.js";

interface AddOptions {
  file?: string;
  proof?: string;
  tag?: string[];
  category?: string;
  notes?: string;
  json?: boolean;
}

export function createAddCommand(): Command {
  return new Command("add")
    .description("Add a lemma to the collection")
    .argument("<statement>", "Statement of the lemma")
    .option("-f, --file <path>", "Lemma collection file")
    .option("-p, --proof <text>", "Proof text")
    .option("-t, --tag <tag...>", "Tags")
    .option("-c, --category <name>", "Category")
    .option("-n, --notes <text>", "Free-form notes")
    .option("--json", "Output the new lemma as JSON")
    .action(async (statement: string, options: AddOptions) => {
      if (options.json) {
        setJsonMode(true);
      }

      try {
        const collection = await openCollection(options);
        const { store, config } = collection;

        const id = store.add({
          statement,
          proof: options.proof,
          tags: options.tag ?? config.defaults.tags,
          category: options.category ?? config.defaults.category,
          notes: options.notes,
        });
        await saveCollection(collection);

        if (options.json || config.output.format === "json") {
          json(store.require(id));
        } else {
          success(`Added ${id}`);
        }
      } catch (err) {
        error(`Could not add lemma: ${describeError(err)}`);
        process.exit(1);
      }
    });
}

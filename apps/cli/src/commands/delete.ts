import { Command } from "commander";
import { openCollection, saveCollection, describeError } from "../collection.js";
import { error, listItem, success, warning } from "../output/reporters.js";

interface DeleteOptions {
  file?: string;
}

export function createDeleteCommand(): Command {
  return new Command("delete")
    .description("Delete a lemma (lemmas depending on it keep the reference)")
    .argument("<id>", "Lemma id")
    .option("-f, --file <path>", "Lemma collection file")
    .action(async (id: string, options: DeleteOptions) => {
      try {
        const collection = await openCollection(options);
        const { store } = collection;

        // Throws for an unknown id
        const dependents = store.graph.directDependents(id);
        store.delete(id);
        await saveCollection(collection);

        success(`Deleted ${id}`);
        if (dependents.length > 0) {
          warning(`${dependents.length} lemma(s) still depend on ${id}:`);
          for (const dependent of dependents) {
            listItem(dependent, 1);
          }
        }
      } catch (err) {
        error(`Could not delete ${id}: ${describeError(err)}`);
        process.exit(1);
      }
    });
}

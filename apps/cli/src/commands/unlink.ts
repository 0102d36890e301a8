import { Command } from "commander";
import { openCollection, saveCollection, describeError } from "../collection.js";
import { error, success, warning } from "../output/reporters.js";

interface UnlinkOptions {
  file?: string;
}

export function createUnlinkCommand(): Command {
  return new Command("unlink")
    .description("Remove a dependency between two lemmas")
    .argument("<from>", "Dependent lemma")
    .argument("<to>", "Lemma it depends on")
    .option("-f, --file <path>", "Lemma collection file")
    .action(async (from: string, to: string, options: UnlinkOptions) => {
      try {
        const collection = await openCollection(options);

        if (!collection.store.removeDependency(from, to)) {
          warning(`${from} does not depend on ${to}`);
          return;
        }
        await saveCollection(collection);

        success(`${from} no longer depends on ${to}`);
      } catch (err) {
        error(`Could not unlink ${from} -> ${to}: ${describeError(err)}`);
        process.exit(1);
      }
    });
}

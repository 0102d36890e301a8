import { Command } from "commander";
import { openCollection, saveCollection, describeError } from "../collection.js";
import { error, success } from "../output/reporters.js";

interface LinkOptions {
  file?: string;
}

export function createLinkCommand(): Command {
  return new Command("link")
    .description("Record that one lemma depends on another")
    .argument("<from>", "Dependent lemma")
    .argument("<to>", "Lemma it depends on")
    .option("-f, --file <path>", "Lemma collection file")
    .action(async (from: string, to: string, options: LinkOptions) => {
      try {
        const collection = await openCollection(options);
        collection.store.addDependency(from, to);
        await saveCollection(collection);

        success(`${from} now depends on ${to}`);
      } catch (err) {
        error(`Could not link ${from} -> ${to}: ${describeError(err)}`);
        process.exit(1);
      }
    });
}

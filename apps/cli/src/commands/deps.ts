import { Command } from "commander";
import { openCollection, describeError } from "../collection.js";
import { error, header, json, setJsonMode } from "../output/reporters.js";
import { formatDependencyTable } from "../output/formatters.js";

interface DepsOptions {
  file?: string;
  reverse?: boolean;
  direct?: boolean;
  includeMissing?: boolean;
  json?: boolean;
}

export function createDepsCommand(): Command {
  return new Command("deps")
    .description("Show what a lemma depends on, directly or transitively")
    .argument("<id>", "Lemma id")
    .option("-f, --file <path>", "Lemma collection file")
    .option("-r, --reverse", "Show lemmas that depend on it instead")
    .option("-d, --direct", "Only direct neighbours")
    .option("--include-missing", "List deleted dependencies too")
    .option("--json", "Output as JSON")
    .action(async (id: string, options: DepsOptions) => {
      if (options.json) {
        setJsonMode(true);
      }

      try {
        const { store, config } = await openCollection(options);
        const { graph } = store;
        const traversal = { includeMissing: options.includeMissing ?? false };

        let ids: string[];
        if (options.reverse) {
          ids = options.direct ? graph.directDependents(id) : graph.ancestors(id);
        } else {
          ids = options.direct
            ? graph.directDependencies(id, traversal)
            : graph.descendants(id, traversal);
        }

        const direction = options.reverse ? "dependents" : "dependencies";
        if (options.json || config.output.format === "json") {
          json({ id, direction, direct: options.direct ?? false, ids });
          return;
        }

        const scope = options.direct ? "Direct" : "All";
        header(`${scope} ${direction} of ${id}`);
        console.log(formatDependencyTable(ids, store));
      } catch (err) {
        error(describeError(err));
        process.exit(1);
      }
    });
}

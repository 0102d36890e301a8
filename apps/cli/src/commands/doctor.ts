import { Command } from "commander";
import { openCollection, saveCollection, describeError } from "../collection.js";
import {
  error,
  header,
  json,
  listItem,
  setJsonMode,
  success,
  warning,
} from "../output/reporters.js";
import { formatDanglingTable } from "../output/formatters.js";

interface DoctorOptions {
  file?: string;
  fix?: boolean;
  json?: boolean;
}

export function createDoctorCommand(): Command {
  return new Command("doctor")
    .description("Check for dangling references and dependency cycles")
    .option("-f, --file <path>", "Lemma collection file")
    .option("--fix", "Remove dangling references")
    .option("--json", "Output as JSON")
    .action(async (options: DoctorOptions) => {
      if (options.json) {
        setJsonMode(true);
      }

      try {
        const collection = await openCollection(options);
        const { store } = collection;

        const dangling = options.fix ? store.guard.repairDangling() : store.findDangling();
        const cycles = store.graph.findCycles();
        if (options.fix) {
          await saveCollection(collection);
        }

        if (options.json || collection.config.output.format === "json") {
          json({ dangling, repaired: options.fix ?? false, cycles });
          return;
        }

        if (dangling.length === 0 && cycles.length === 0) {
          success("No dangling references or cycles");
          return;
        }

        if (dangling.length > 0) {
          header(options.fix ? "Removed dangling references" : "Dangling references");
          console.log(formatDanglingTable(dangling));
          if (!options.fix) {
            warning("Run `lemma doctor --fix` to remove them.");
          }
        }

        if (cycles.length > 0) {
          header("Dependency cycles");
          for (const cycle of cycles) {
            listItem(cycle.join(" <-> "));
          }
        }
      } catch (err) {
        error(describeError(err));
        process.exit(1);
      }
    });
}

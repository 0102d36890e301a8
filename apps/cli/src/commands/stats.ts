import { Command } from "commander";
import { collectionStatistics } from "@lemmaledger/core";
import { openCollection, describeError } from "../collection.js";
import { error, header, json, keyValue, newline, setJsonMode } from "../output/reporters.js";
import { formatCountTable } from "../output/formatters.js";

interface StatsOptions {
  file?: string;
  json?: boolean;
}

export function createStatsCommand(): Command {
  return new Command("stats")
    .description("Show collection statistics")
    .option("-f, --file <path>", "Lemma collection file")
    .option("--json", "Output as JSON")
    .action(async (options: StatsOptions) => {
      if (options.json) {
        setJsonMode(true);
      }

      try {
        const { store, config } = await openCollection(options);
        const stats = collectionStatistics(store);

        if (options.json || config.output.format === "json") {
          json(stats);
          return;
        }

        header("Collection Statistics");
        keyValue("Total lemmas", String(stats.totalLemmas));
        keyValue("With proof", String(stats.withProof));
        keyValue("Without proof", String(stats.withoutProof));
        keyValue("With dependencies", String(stats.withDependencies));
        keyValue("Dependency edges", String(stats.dependencyEdges));
        keyValue("Dangling references", String(stats.danglingReferences));
        keyValue("Cycles", String(stats.cycles));
        keyValue("Last modified", stats.metadata.last_modified);
        newline();
        console.log(formatCountTable("Category", stats.categories));
        newline();
        console.log(formatCountTable("Tag", stats.tags));
      } catch (err) {
        error(describeError(err));
        process.exit(1);
      }
    });
}

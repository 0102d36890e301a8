import { Command } from "commander";
import { mkdir, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { openCollection, describeError } from "../collection.js";
import { error, success } from "../output/reporters.js";

interface GraphOptions {
  file?: string;
  output?: string;
}

export function createGraphCommand(): Command {
  return new Command("graph")
    .description("Render the dependency graph in Graphviz DOT format")
    .option("-f, --file <path>", "Lemma collection file")
    .option("-o, --output <path>", "Write to a file instead of stdout")
    .action(async (options: GraphOptions) => {
      try {
        const { store } = await openCollection(options);
        const dot = store.graph.toDOT();

        if (!options.output) {
          console.log(dot);
          return;
        }

        const outputPath = resolve(process.cwd(), options.output);
        await mkdir(dirname(outputPath), { recursive: true });
        await writeFile(outputPath, dot + "\n", "utf-8");
        success(`Wrote dependency graph to ${outputPath}`);
      } catch (err) {
        error(describeError(err));
        process.exit(1);
      }
    });
}

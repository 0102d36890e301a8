import { Command } from "commander";
import { searchLemmas, type SearchCriteria } from "@lemmaledger/core";
import { openCollection, describeError } from "../collection.js";
import { error, info, json, setJsonMode } from "../output/reporters.js";
import { formatLemmaTable } from "../output/formatters.js";

interface SearchOptions {
  file?: string;
  tag?: string[];
  category?: string;
  proven?: boolean;
  unproven?: boolean;
  regex?: boolean;
  json?: boolean;
}

export function toCriteria(text: string | undefined, options: SearchOptions): SearchCriteria {
  if (options.proven && options.unproven) {
    throw new Error("--proven and --unproven cannot be combined");
  }

  const criteria: SearchCriteria = {};
  if (text !== undefined) criteria.text = text;
  if (options.tag !== undefined) criteria.tags = options.tag;
  if (options.category !== undefined) criteria.category = options.category;
  if (options.regex) criteria.regex = true;
  if (options.proven) criteria.hasProof = true;
  if (options.unproven) criteria.hasProof = false;
  return criteria;
}

export function createSearchCommand(): Command {
  return new Command("search")
    .description("Search statements, proofs and notes")
    .argument("[text]", "Text to look for (case-insensitive)")
    .option("-f, --file <path>", "Lemma collection file")
    .option("-t, --tag <tag...>", "Require every tag")
    .option("-c, --category <name>", "Only this category")
    .option("--proven", "Only lemmas with a proof")
    .option("--unproven", "Only lemmas without a proof")
    .option("--regex", "Treat text as a regular expression")
    .option("--json", "Output as JSON")
    .action(async (text: string | undefined, options: SearchOptions) => {
      if (options.json) {
        setJsonMode(true);
      }

      try {
        const criteria = toCriteria(text, options);
        const { store, config } = await openCollection(options);
        const results = Array.from(searchLemmas(store, criteria).values());

        if (options.json || config.output.format === "json") {
          json(results);
          return;
        }

        if (results.length === 0) {
          info("No lemmas match.");
          return;
        }
        console.log(formatLemmaTable(results));
        info(`${results.length} match(es)`);
      } catch (err) {
        error(`Search failed: ${describeError(err)}`);
        process.exit(1);
      }
    });
}

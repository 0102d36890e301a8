import { Command } from "commander";
import {
  renderLemma,
  searchLemmas,
  type LemmaStore,
  type NewLemma,
} from "@lemmaledger/core";
import { openCollection, saveCollection, describeError } from "../collection.js";
import { error, header, keyValue, success } from "../output/reporters.js";

const SAMPLE_LEMMAS: NewLemma[] = [
  {
    statement: "For all integers n, n + 0 = n",
    proof: "By the identity property of addition",
    tags: ["arithmetic", "basic", "identity"],
    category: "algebra",
  },
  {
    statement: "For all integers a, b: a + b = b + a",
    proof: "By the commutative property of addition",
    tags: ["arithmetic", "commutative"],
    category: "algebra",
  },
  {
    statement: "Sum of first n natural numbers = n(n+1)/2",
    proof: "By mathematical induction using base case n=1 and inductive step",
    tags: ["series", "induction"],
    category: "number_theory",
    notes: "Classic result used in many complexity analyses",
  },
];

interface DemoOptions {
  file?: string;
}

/**
 * Add the sample lemmas, link the last one to the first two and return
 * the new ids in order
 */
export function seedSampleLemmas(store: LemmaStore): string[] {
  const ids = SAMPLE_LEMMAS.map((lemma) => store.add(lemma));
  const [identity, commutativity, series] = ids;
  if (identity && commutativity && series) {
    store.addDependency(series, identity);
    store.addDependency(series, commutativity);
  }
  return ids;
}

export function createDemoCommand(): Command {
  return new Command("demo")
    .description("Add three sample lemmas with dependencies and show them off")
    .option("-f, --file <path>", "Lemma collection file")
    .action(async (options: DemoOptions) => {
      try {
        const collection = await openCollection(options);
        const { store } = collection;

        const ids = seedSampleLemmas(store);
        await saveCollection(collection);
        success(`Added ${ids.length} sample lemmas`);

        header("All lemmas");
        for (const { id, statement } of store.list()) {
          keyValue(id, statement, 1);
        }

        const last = ids[ids.length - 1];
        if (last !== undefined) {
          header(`${last} as Markdown`);
          console.log(renderLemma(store.require(last), "markdown").trimEnd());
        }

        header("Search for 'induction'");
        for (const [id, record] of searchLemmas(store, { text: "induction" })) {
          keyValue(id, record.statement, 1);
        }
      } catch (err) {
        error(`Demo failed: ${describeError(err)}`);
        process.exit(1);
      }
    });
}

import { Command, Option } from "commander";
import { UnknownRecordError, type LemmaPatch } from "@lemmaledger/core";
import { openCollection, saveCollection, describeError } from "../collection.js";
import { error, success, warning } from "../output/reporters.js";

const CLEARABLE_FIELDS = ["proof", "category", "notes"] as const;
type ClearableField = (typeof CLEARABLE_FIELDS)[number];

interface UpdateOptions {
  file?: string;
  statement?: string;
  proof?: string;
  tags?: string;
  category?: string;
  notes?: string;
  clear?: ClearableField[];
}

/**
 * Turn command-line flags into a patch. `--tags` takes a comma-separated list
 * and replaces the existing tags.
 */
export function buildPatch(options: UpdateOptions): LemmaPatch {
  const patch: LemmaPatch = {};
  if (options.statement !== undefined) patch.statement = options.statement;
  if (options.proof !== undefined) patch.proof = options.proof;
  if (options.category !== undefined) patch.category = options.category;
  if (options.notes !== undefined) patch.notes = options.notes;
  if (options.tags !== undefined) {
    patch.tags = options.tags.split(",").filter((tag) => tag.trim().length > 0);
  }
  for (const field of options.clear ?? []) {
    patch[field] = null;
  }
  return patch;
}

export function createUpdateCommand(): Command {
  return new Command("update")
    .description("Change fields of an existing lemma")
    .argument("<id>", "Lemma id")
    .option("-f, --file <path>", "Lemma collection file")
    .option("-s, --statement <text>", "New statement")
    .option("-p, --proof <text>", "New proof")
    .option("-t, --tags <tags>", "Comma-separated tags, replacing the current ones")
    .option("-c, --category <name>", "New category")
    .option("-n, --notes <text>", "New notes")
    .addOption(
      new Option("--clear <field...>", "Remove optional fields").choices(CLEARABLE_FIELDS),
    )
    .action(async (id: string, options: UpdateOptions) => {
      try {
        const patch = buildPatch(options);
        if (Object.keys(patch).length === 0) {
          warning("Nothing to update. Pass at least one field option.");
          return;
        }

        const collection = await openCollection(options);
        if (!collection.store.update(id, patch)) {
          throw new UnknownRecordError(id);
        }
        await saveCollection(collection);

        success(`Updated ${id}`);
      } catch (err) {
        error(`Could not update ${id}: ${describeError(err)}`);
        process.exit(1);
      }
    });
}

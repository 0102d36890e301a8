import chalk from 'chalk';
import Table from 'cli-table3';
import type { DanglingReference, LemmaRecord, LemmaStore } from '@lemmaledger/core';

const STATEMENT_WIDTH = 60;

export function truncate(value: string, max: number = STATEMENT_WIDTH): string {
  const singleLine = value.replace(/\s+/g, ' ');
  return singleLine.length > max ? singleLine.slice(0, max - 3) + '...' : singleLine;
}

// Format lemma table
export function formatLemmaTable(records: LemmaRecord[]): string {
  if (records.length === 0) {
    return chalk.dim('No lemmas found.');
  }

  const table = new Table({
    head: [
      chalk.bold('Id'),
      chalk.bold('Category'),
      chalk.bold('Proof'),
      chalk.bold('Statement'),
    ],
    style: { head: [], border: [] },
  });

  for (const record of records) {
    table.push([
      record.id,
      record.category ?? chalk.dim('-'),
      record.proof !== undefined ? chalk.green('yes') : chalk.yellow('no'),
      truncate(record.statement),
    ]);
  }

  return table.toString();
}

// Format a dependency chain; ids missing from the store are flagged
export function formatDependencyTable(ids: string[], store: LemmaStore): string {
  if (ids.length === 0) {
    return chalk.dim('No dependencies.');
  }

  const table = new Table({
    head: [chalk.bold('Id'), chalk.bold('Statement')],
    style: { head: [], border: [] },
  });

  for (const id of ids) {
    const record = store.get(id);
    table.push([id, record ? truncate(record.statement) : chalk.red('(missing)')]);
  }

  return table.toString();
}

export function formatDanglingTable(references: DanglingReference[]): string {
  if (references.length === 0) {
    return chalk.green('No dangling references.');
  }

  const table = new Table({
    head: [chalk.bold('Lemma'), chalk.bold('Missing dependency')],
    style: { head: [], border: [] },
  });

  for (const reference of references) {
    table.push([reference.referencingId, chalk.red(reference.missingId)]);
  }

  return table.toString();
}

// Name/count table, largest first
export function formatCountTable(label: string, counts: Record<string, number>): string {
  const entries = Object.entries(counts).sort(
    ([leftName, left], [rightName, right]) => right - left || leftName.localeCompare(rightName),
  );
  if (entries.length === 0) {
    return chalk.dim(`No ${label.toLowerCase()}.`);
  }

  const table = new Table({
    head: [chalk.bold(label), chalk.bold('Lemmas')],
    style: { head: [], border: [] },
  });

  for (const [name, count] of entries) {
    table.push([name, String(count)]);
  }

  return table.toString();
}

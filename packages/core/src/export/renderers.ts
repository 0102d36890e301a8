import { z } from 'zod';
import type { CollectionMetadata } from '../models/collection.js';
import type { LemmaRecord } from '../models/lemma.js';

export const ExportFormatSchema = z.enum(['text', 'markdown', 'latex', 'json']);
export type ExportFormat = z.infer<typeof ExportFormatSchema>;

export interface CollectionRenderOptions {
  title?: string;
  generatedAt?: Date;
  metadata?: CollectionMetadata;
}

export const DEFAULT_EXPORT_TITLE = 'Lemma Collection';

// ============================================================================
// Single lemma
// ============================================================================

export function renderLemma(record: LemmaRecord, format: ExportFormat): string {
  switch (format) {
    case 'text':
      return renderText(record);
    case 'markdown':
      return renderMarkdown(record);
    case 'latex':
      return renderLatex(record);
    case 'json':
      return JSON.stringify({ [record.id]: withoutId(record) }, null, 2) + '\n';
  }
}

function renderText(record: LemmaRecord): string {
  const lines = [`Id: ${record.id}`];
  if (record.category) lines.push(`Category: ${record.category}`);
  lines.push(`Statement: ${record.statement}`);
  if (record.proof) lines.push(`Proof: ${record.proof}`);
  if (record.tags.length > 0) lines.push(`Tags: ${record.tags.join(', ')}`);
  if (record.notes) lines.push(`Notes: ${record.notes}`);
  if (record.dependencies.length > 0) lines.push(`Depends on: ${record.dependencies.join(', ')}`);
  lines.push(`Created: ${record.created}`);
  lines.push(`Modified: ${record.modified}`);
  return lines.join('\n') + '\n';
}

function renderMarkdown(record: LemmaRecord): string {
  const blocks = [`## ${record.id}`];
  if (record.category) blocks.push(`**Category:** ${record.category}`);
  blocks.push(`**Statement:** ${record.statement}`);
  if (record.proof) blocks.push(`**Proof:**\n\n${record.proof}`);
  if (record.tags.length > 0) {
    blocks.push(`**Tags:** ${record.tags.map((tag) => `\`${tag}\``).join(', ')}`);
  }
  if (record.notes) blocks.push(`**Notes:** ${record.notes}`);
  if (record.dependencies.length > 0) {
    const links = record.dependencies.map((id) => `[${id}](#${id.toLowerCase()})`);
    blocks.push(`**Dependencies:** ${links.join(', ')}`);
  }
  blocks.push(`*Created: ${record.created}*`);
  blocks.push(`*Modified: ${record.modified}*`);
  return blocks.join('\n\n') + '\n';
}

function renderLatex(record: LemmaRecord): string {
  const lines = [
    `\\begin{lemma}[${escapeLatex(record.id)}]`,
    `\\label{lemma:${record.id}}`,
    record.statement,
    '\\end{lemma}',
  ];
  if (record.proof) {
    lines.push('', '\\begin{proof}', record.proof, '\\end{proof}');
  }

  const comments: string[] = [];
  if (record.category) comments.push(`Category: ${record.category}`);
  if (record.tags.length > 0) comments.push(`Tags: ${record.tags.join(', ')}`);
  if (record.notes) comments.push(`Notes: ${record.notes}`);
  if (record.dependencies.length > 0) comments.push(`Depends on: ${record.dependencies.join(', ')}`);
  if (comments.length > 0) {
    lines.push('', ...comments.flatMap(latexComment));
  }

  return lines.join('\n') + '\n';
}

// A LaTeX comment ends at the newline, so every line gets its own '%'
function latexComment(text: string): string[] {
  return text.split('\n').map((line) => `% ${line}`);
}

const LATEX_SPECIALS: Record<string, string> = {
  '\\': '\\textbackslash{}',
  '{': '\\{',
  '}': '\\}',
  $: '\\$',
  '&': '\\&',
  '#': '\\#',
  '%': '\\%',
  _: '\\_',
  '^': '\\textasciicircum{}',
  '~': '\\textasciitilde{}',
};

// Plain text set in the document; statements and proofs are already LaTeX
function escapeLatex(text: string): string {
  return text.replace(/[\\{}$&#%_^~]/g, (char) => LATEX_SPECIALS[char] ?? char);
}

// ============================================================================
// Whole collection
// ============================================================================

export function renderCollection(
  records: LemmaRecord[],
  format: ExportFormat,
  options: CollectionRenderOptions = {},
): string {
  const sorted = [...records].sort((left, right) =>
    left.id.localeCompare(right.id, undefined, { numeric: true }),
  );

  if (format === 'json') {
    const document = {
      ...(options.metadata ? { metadata: options.metadata } : {}),
      records: Object.fromEntries(sorted.map((record) => [record.id, withoutId(record)])),
    };
    return JSON.stringify(document, null, 2) + '\n';
  }

  const body = sorted.map((record) => renderLemma(record, format)).join('\n');

  if (format === 'markdown') {
    const generatedAt = (options.generatedAt ?? new Date()).toISOString();
    const header = [
      `# ${options.title ?? DEFAULT_EXPORT_TITLE}`,
      `Generated: ${generatedAt}`,
      `Total Lemmas: ${records.length}`,
      '---',
    ].join('\n\n');
    return `${header}\n\n${body}`;
  }

  if (format === 'latex') {
    const preamble = [
      '\\documentclass{article}',
      '\\usepackage{amsthm}',
      '\\newtheorem{lemma}{Lemma}',
      `\\title{${escapeLatex(options.title ?? DEFAULT_EXPORT_TITLE)}}`,
      '\\begin{document}',
      '',
    ].join('\n');
    return `${preamble}\n${body}\n\\end{document}\n`;
  }

  return body;
}

function withoutId(record: LemmaRecord): Omit<LemmaRecord, 'id'> {
  const { id: _id, ...rest } = record;
  return rest;
}

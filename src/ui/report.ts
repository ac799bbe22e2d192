import chalk from 'chalk';
import type { Finding, ReportResult } from '../types/report.js';
import { renderTable } from './table.js';

const WRAP_WIDTH = 73;

export function wrap(text: string, width = WRAP_WIDTH): string[] {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (line && line.length + 1 + word.length > width) {
      lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines;
}

/** `order` first, then every other key in first-seen order. */
export function columnsFor(findings: Finding[], order: string[]): string[] {
  const columns = [...order];
  for (const finding of findings) {
    for (const key of Object.keys(finding)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  return columns.filter((c) => findings.some((f) => c in f));
}

function section(findings: Finding[], order: string[]): string {
  const columns = columnsFor(findings, order);
  const rows = findings.map((f) => columns.map((c) => (c in f ? String(f[c]) : '')));
  return renderTable(columns, rows);
}

export function renderReport(result: ReportResult): string {
  const out: string[] = [chalk.bold.green(`🌲 ${result.title}`)];
  if (result.description) {
    out.push(...wrap(result.description).map((l) => `\t${l}`), '');
  }
  if (result.items.length === 0 && result.metadata.length === 0) {
    out.push('\tNo items.', '');
    return out.join('\n');
  }
  if (result.items.length > 0) {
    out.push(`\tItems (${result.items.length}):`, section(result.items, result.itemsOrder), '');
  }
  if (result.metadata.length > 0) {
    out.push('\tMetadata:');
    for (const entry of result.metadata) {
      for (const [key, value] of Object.entries(entry)) out.push(`\t${key}: ${value}`);
    }
    out.push('');
  }
  return out.join('\n');
}

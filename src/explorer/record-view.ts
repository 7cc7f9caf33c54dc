import { writeFile } from 'fs/promises';
import { Dataset, DataRecord } from '../types';
import { display, exportValue, isRich, isTextLike } from '../data/cell-normalizer';
import { ExportError, StorageError, errorMessage, logger } from '../utils';
import { FieldMapping, GENERIC_MAPPING } from './field-mappings';

export const UNKNOWN_VALUE = 'Unknown';
export const DEFAULT_COLUMN_WIDTH = 40;

export interface RenderOptions {
  maxRows?: number;
  maxColumnWidth?: number;
  noun?: string;
}

export type FrequencyEntry = [value: string, count: number];

// ===== FILTERING =====

function matches(record: DataRecord, field: string, needle: string): boolean {
  const cell = record.get(field);
  if (!isTextLike(cell)) return false;
  return display(cell).toLowerCase().includes(needle);
}

export function filter(records: readonly DataRecord[], field: string, keyword: string): DataRecord[] {
  const needle = keyword.toLowerCase();
  return records.filter((record) => matches(record, field, needle));
}

export function filterAny(records: readonly DataRecord[], fields: readonly string[], keyword: string): DataRecord[] {
  const needle = keyword.toLowerCase();
  return records.filter((record) => fields.some((field) => matches(record, field, needle)));
}

// ===== STATISTICS =====

/**
 * Counts per display value, in first-seen order. Records without the field
 * are counted under "Unknown".
 */
export function frequency(records: readonly DataRecord[], field: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of records) {
    const cell = record.get(field);
    const key = cell === undefined ? UNKNOWN_VALUE : display(cell);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

// Array.prototype.sort is stable, so ties keep first-seen order
export function topN(counts: ReadonlyMap<string, number>, n?: number): FrequencyEntry[] {
  const sorted = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  return n === undefined ? sorted : sorted.slice(0, n);
}

export function distinctCount(records: readonly DataRecord[], field: string): number {
  const seen = new Set<string>();
  for (const record of records) {
    const text = display(record.get(field));
    if (text) seen.add(text);
  }
  return seen.size;
}

export function countArtifacts(records: readonly DataRecord[], field: string, kind: string): number {
  return records.filter((record) => isRich(record.get(field), kind)).length;
}

// ===== RENDERING =====

export function columnsOf(records: readonly DataRecord[]): string[] {
  return records.length > 0 ? [...records[0].keys()] : [];
}

function clip(text: string, width: number): string {
  const flat = text.replace(/\s*[\r\n]+\s*/g, ' ');
  if (flat.length <= width) return flat;
  if (width <= 3) return flat.slice(0, width);
  return `${flat.slice(0, width - 3)}...`;
}

export function render(records: readonly DataRecord[], options: RenderOptions = {}): string {
  if (records.length === 0) {
    return 'No data to display';
  }

  const maxColumnWidth = options.maxColumnWidth ?? DEFAULT_COLUMN_WIDTH;
  const columns = columnsOf(records);
  const shown = options.maxRows === undefined ? records : records.slice(0, options.maxRows);

  const header = columns.map((column) => clip(column, maxColumnWidth));
  const rows = shown.map((record) => columns.map((column) => clip(display(record.get(column)), maxColumnWidth)));

  const widths = header.map((title, index) =>
    Math.max(title.length, ...rows.map((row) => row[index].length))
  );

  const border = (fill: string): string => `+${widths.map((width) => fill.repeat(width + 2)).join('+')}+`;
  const line = (cells: string[]): string =>
    `|${cells.map((cell, index) => ` ${cell.padEnd(widths[index])} `).join('|')}|`;

  const out = [border('-'), line(header), border('=')];
  for (const row of rows) {
    out.push(line(row), border('-'));
  }

  if (options.maxRows !== undefined && records.length > options.maxRows) {
    out.push('', `... showing ${options.maxRows} of ${records.length} total ${options.noun ?? 'records'}`);
  }

  return out.join('\n');
}

export function formatFrequency(title: string, entries: readonly FrequencyEntry[]): string {
  return [`${title}:`, ...entries.map(([value, count]) => `  ${value}: ${count}`)].join('\n');
}

export function formatMetadata(dataset: Dataset): string {
  const { metadata } = dataset;
  const pages =
    metadata.reportedTotalPages !== undefined && metadata.reportedTotalPages !== metadata.totalPagesScraped
      ? `${metadata.totalPagesScraped} of ${metadata.reportedTotalPages}`
      : String(metadata.totalPagesScraped);

  const lines = [
    `Scraped: ${metadata.scrapeTimestamp || 'N/A'}`,
    `Market Type: ${metadata.marketType ?? 'N/A'}`,
    `Total Records: ${dataset.records.length}`,
    `Pages Fetched: ${pages}`,
    `Source: ${metadata.sourceUrl ?? metadata.sourceEndpoint}`,
  ];
  if (dataset.fetchError) {
    lines.push(`Fetch Error: ${dataset.fetchError.kind} on page ${dataset.fetchError.page} (${dataset.fetchError.message})`);
  }
  if (dataset.interrupted) {
    lines.push('Fetch Interrupted: yes');
  }
  return lines.join('\n');
}

// ===== EXPORT =====

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(records: readonly DataRecord[]): string {
  const columns = columnsOf(records);
  const lines = [columns.map(csvField).join(',')];
  for (const record of records) {
    lines.push(columns.map((column) => csvField(exportValue(record.get(column)))).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export async function exportCsv(records: readonly DataRecord[], path: string): Promise<number> {
  if (records.length === 0) {
    throw new ExportError('No records to export', { path });
  }

  try {
    // BOM so spreadsheet tools pick up UTF-8
    await writeFile(path, `\uFEFF${toCsv(records)}`, 'utf-8');
  } catch (error) {
    throw new StorageError(path, errorMessage(error));
  }

  logger.storage('CSV exported', { path, rows: records.length });
  return records.length;
}

/**
 * Read-only exploration over one loaded dataset, parameterized by the
 * dataset family's field mapping.
 */
export class RecordView {
  readonly dataset: Dataset;
  readonly mapping: FieldMapping;

  constructor(dataset: Dataset, mapping: FieldMapping = GENERIC_MAPPING) {
    this.dataset = dataset;
    this.mapping = mapping;
  }

  get records(): readonly DataRecord[] {
    return this.dataset.records;
  }

  filter(field: string, keyword: string): DataRecord[] {
    return filter(this.records, field, keyword);
  }

  search(fields: readonly string[], keyword: string): DataRecord[] {
    return filterAny(this.records, fields, keyword);
  }

  frequency(field: string): Map<string, number> {
    return frequency(this.records, field);
  }

  render(records: readonly DataRecord[] = this.records, maxRows?: number): string {
    return render(records, { maxRows, noun: this.mapping.noun });
  }

  exportCsv(path: string, records: readonly DataRecord[] = this.records): Promise<number> {
    return exportCsv(records, path);
  }

  statistics(): string {
    const { mapping, records } = this;
    const lines: string[] = [];

    if (mapping.entityField) {
      lines.push(`Unique Companies: ${distinctCount(records, mapping.entityField)}`);
    }
    lines.push(`Total ${mapping.noun}: ${records.length}`);
    for (const artifact of mapping.artifacts) {
      lines.push(`${artifact.label}: ${countArtifacts(records, artifact.field, artifact.kind)}`);
    }

    for (const statistic of mapping.statistics) {
      lines.push('', formatFrequency(statistic.title, topN(this.frequency(statistic.field), statistic.top)));
    }

    return lines.join('\n');
  }
}

import { CellValue, DataRecord, ScalarValue } from '../types';

/**
 * Cells arrive either as plain scalars or as structured `{ text, type, link }`
 * objects. The variant is decided here, once, and everything downstream
 * (filtering, rendering, export) works on the tagged value.
 */

// Kinds that point at a downloadable artifact get a bracketed tag on display
const ARTIFACT_TAGS: ReadonlyMap<string, string> = new Map([
  ['pdf', 'PDF'],
  ['document', 'PDF'],
  ['xbrl', 'XBRL'],
  ['structured-data', 'XBRL'],
]);

const EMPTY: CellValue = { variant: 'scalar', value: null };

export function scalar(value: ScalarValue): CellValue {
  return { variant: 'scalar', value };
}

export function rich(text: string, kind: string, link?: string, raw?: Readonly<Record<string, unknown>>): CellValue {
  const wire = raw ?? { text, type: kind, ...(link && { link }) };
  return link ? { variant: 'rich', text, kind, link, raw: wire } : { variant: 'rich', text, kind, raw: wire };
}

// Unusable input displays as empty but is kept for the round trip to disk
function opaque(raw: unknown): CellValue {
  return { variant: 'scalar', value: null, raw };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseCell(raw: unknown): CellValue {
  if (raw === null || raw === undefined) return EMPTY;

  if (typeof raw === 'string' || typeof raw === 'boolean') {
    return scalar(raw);
  }

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? scalar(raw) : opaque(raw);
  }

  if (isPlainObject(raw)) {
    const text = raw.text;
    if (typeof text !== 'string' && typeof text !== 'number') {
      return opaque(raw);
    }
    const kind = typeof raw.type === 'string' ? raw.type : '';
    const link = typeof raw.link === 'string' && raw.link !== '' ? raw.link : undefined;
    return rich(String(text), kind, link, raw);
  }

  return opaque(raw);
}

export function parseRecord(raw: Record<string, unknown>): DataRecord {
  const record = new Map<string, CellValue>();
  for (const [field, value] of Object.entries(raw)) {
    record.set(field, parseCell(value));
  }
  return record;
}

function plainText(cell: CellValue | undefined): string {
  if (!cell) return '';
  if (cell.variant === 'rich') return cell.text;
  if (cell.value === null || cell.value === '') return '';
  return String(cell.value);
}

export function display(cell: CellValue | undefined): string {
  const text = plainText(cell);
  if (cell?.variant !== 'rich') return text;

  const tag = ARTIFACT_TAGS.get(cell.kind.toLowerCase());
  return tag ? `${text} [${tag}]` : text;
}

export function exportValue(cell: CellValue | undefined): string {
  return plainText(cell);
}

export function isRich(cell: CellValue | undefined, kind?: string): boolean {
  if (cell?.variant !== 'rich') return false;
  return kind === undefined || cell.kind.toLowerCase() === kind.toLowerCase();
}

// Text-like means something a keyword can be matched against
export function isTextLike(cell: CellValue | undefined): boolean {
  if (!cell) return false;
  return cell.variant === 'rich' || typeof cell.value === 'string';
}

export function toWireCell(cell: CellValue): unknown {
  if (cell.variant === 'rich') return cell.raw;
  return cell.raw !== undefined ? cell.raw : cell.value;
}

export function toWireRecord(record: DataRecord): Record<string, unknown> {
  const wire: Record<string, unknown> = {};
  for (const [field, cell] of record) {
    wire[field] = toWireCell(cell);
  }
  return wire;
}

import { parse } from 'csv-parse/sync';

/** One data row keyed by normalized header name; missing cells are undefined */
export type CsvRecord = Partial<Record<string, string>>;

export interface CsvParseResult {
  header: string[];
  rows: CsvRecord[];
  error?: string;
}

export const REQUIRED_COLUMNS = ['date', 'description', 'amount'] as const;

export const EMPTY_PAYLOAD_ERROR = 'payload is empty or malformed';
export const DECODING_ERROR = 'decoding error: file must be UTF-8 encoded';

/**
 * Decode file bytes as UTF-8. A leading BOM is dropped.
 * Returns null when the bytes are not valid UTF-8.
 */
export function decodeFileContent(bytes: Uint8Array): string | null {
  try {
    const decoder = new TextDecoder('utf-8', { fatal: true });
    return decoder.decode(bytes);
  } catch {
    return null;
  }
}

function normalizeHeader(names: string[]): string[] {
  return names.map((name) => name.toLowerCase().trim());
}

function toRecord(value: unknown): CsvRecord | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  const record: CsvRecord = {};
  for (const [key, cell] of Object.entries(value)) {
    if (typeof cell === 'string') record[key] = cell;
  }
  return record;
}

/**
 * Parse CSV text with a header row (quoted fields, blank lines skipped).
 * The header decides the column mapping; names are lower-cased and trimmed.
 */
export function parseCsvText(text: string): CsvParseResult {
  let header: string[] = [];
  let parsed: unknown;

  try {
    parsed = parse(text, {
      columns: (names: string[]) => (header = normalizeHeader(names)),
      skip_empty_lines: true,
      relax_column_count: true,
      // A quote inside an unquoted cell is literal text
      relax_quotes: true,
    });
  } catch {
    return { header, rows: [], error: EMPTY_PAYLOAD_ERROR };
  }

  const rows = Array.isArray(parsed)
    ? parsed.map(toRecord).filter((r): r is CsvRecord => r !== null)
    : [];

  if (rows.length === 0) {
    return { header, rows: [], error: EMPTY_PAYLOAD_ERROR };
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    return { header, rows: [], error: `missing required column(s): ${missing.join(', ')}` };
  }

  return { header, rows };
}

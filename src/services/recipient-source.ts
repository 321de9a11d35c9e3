import { parse } from 'csv-parse/sync';
import { readFile } from 'node:fs/promises';
import type { RecipientRow } from '../types/campaign.js';

export const PHONE_COLUMN = 'phone';
export const FIRST_NAME_COLUMN = 'first_name';

export class RecipientSourceError extends Error {
  readonly sourcePath: string;

  constructor(sourcePath: string, message: string) {
    super(message);
    this.name = 'RecipientSourceError';
    this.sourcePath = sourcePath;
  }
}

export interface RecipientTable {
  sourcePath: string;
  headers: string[];
  phoneHeader: string;
  firstNameHeader: string | null;
  rows: RecipientRow[];
}

function isStringGrid(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}

function findHeaderIndex(headers: string[], name: string): number {
  const wanted = name.toLowerCase();
  return headers.findIndex((header) => header.toLowerCase() === wanted);
}

/** Parse CSV text whose header row names a `phone` column (any case). */
export function parseRecipientTable(sourcePath: string, content: string): RecipientTable {
  const grid: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!isStringGrid(grid)) {
    throw new RecipientSourceError(sourcePath, `CSV at ${sourcePath} could not be parsed.`);
  }

  const [headers, ...records] = grid;
  if (!headers || headers.length === 0) {
    throw new RecipientSourceError(sourcePath, 'CSV appears empty or missing headers.');
  }

  const phoneIndex = findHeaderIndex(headers, PHONE_COLUMN);
  if (phoneIndex < 0) {
    throw new RecipientSourceError(
      sourcePath,
      `CSV must include '${PHONE_COLUMN}'. Found: ${JSON.stringify(headers)}`,
    );
  }
  const firstNameIndex = findHeaderIndex(headers, FIRST_NAME_COLUMN);

  const rows = records.map((record): RecipientRow => ({
    rawPhone: record[phoneIndex] ?? '',
    firstName: firstNameIndex >= 0 ? record[firstNameIndex] ?? '' : '',
  }));

  return {
    sourcePath,
    headers,
    phoneHeader: headers[phoneIndex],
    firstNameHeader: firstNameIndex >= 0 ? headers[firstNameIndex] : null,
    rows,
  };
}

export async function loadRecipientTable(sourcePath: string): Promise<RecipientTable> {
  let content: string;
  try {
    content = await readFile(sourcePath, 'utf8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new RecipientSourceError(sourcePath, `CSV not found at ${sourcePath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new RecipientSourceError(sourcePath, `CSV at ${sourcePath} could not be read: ${message}`);
  }

  try {
    return parseRecipientTable(sourcePath, content);
  } catch (error) {
    if (error instanceof RecipientSourceError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new RecipientSourceError(sourcePath, `CSV at ${sourcePath} could not be parsed: ${message}`);
  }
}

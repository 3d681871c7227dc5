import { promises as fs } from 'fs';
import { JsonValue } from '../statement';
import { MalformedRecordError } from '../errors';
import { getLogger } from '../util/logger';

const logger = getLogger('table');

export type TableRecord = { [key: string]: JsonValue };

export type RecordId = string | number;

// Keyed by each record's `id`, in the order ids first appear in the file.
export type Table = Map<RecordId, TableRecord>;

// JSON `-0` reads as `0`, so it compares equal to a `0` literal.
function reviveNumber(_key: string, value: unknown): unknown {
  return Object.is(value, -0) ? 0 : value;
}

function isRecord(value: unknown): value is TableRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRecordId(value: unknown): value is RecordId {
  return typeof value === 'string' || typeof value === 'number';
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function parseTable(path: string, content: string): Table {
  let table: Table = new Map();
  let lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
  for (let i = 0; i < lines.length; ++i) {
    let line = lines[i];
    if (line.trim() === '') continue;
    let value: unknown;
    try {
      value = JSON.parse(line, reviveNumber);
    } catch (e) {
      throw new MalformedRecordError(path, i + 1, 'invalid JSON', e);
    }
    if (!isRecord(value)) {
      throw new MalformedRecordError(path, i + 1, 'expected a JSON object');
    }
    let id = value.id;
    if (!isRecordId(id)) {
      throw new MalformedRecordError(path, i + 1,
        'expected a string or number id');
    }
    if (table.has(id)) {
      logger.warn(`Duplicate id ${JSON.stringify(id)} at ${path}:${i + 1}` +
        ' replaces an earlier record');
    }
    table.set(id, value);
  }
  return table;
}

/**
 * Reads a newline-delimited JSON file into a table. Resolves to null when the
 * file does not exist; any other read failure or a bad line rejects.
 */
export async function loadTable(path: string): Promise<Table | null> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf8');
  } catch (e) {
    if (isMissing(e)) {
      logger.info('Source not found:', path);
      return null;
    }
    throw e;
  }
  let table = parseTable(path, content);
  logger.debug(() => ['Loaded', table.size, 'records from', path]);
  return table;
}

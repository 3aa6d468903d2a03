import fs from 'fs';
import { isNodeError } from './errors';
import { formatTimestamp } from './timestamp';
import { DeleteResult, ExpenseRecord, Logger, Selection } from './types';

const MIN_FIELDS = 3;

export type ParsedLine =
  | { ok: true; record: ExpenseRecord }
  | { ok: false; reason: 'too-few-fields' | 'bad-amount' };

// A quoted field ends at a lone `"` followed by a comma or the end of the line
function readQuotedField(line: string, start: number): { value: string; end: number } | null {
  let value = '';
  for (let i = start + 1; i < line.length; i++) {
    const char = line[i];
    if (char !== '"') {
      value += char;
    } else if (line[i + 1] === '"') {
      value += '"';
      i++;
    } else {
      const end = i + 1;
      return end === line.length || line[end] === ',' ? { value, end } : null;
    }
  }
  return null;
}

/**
 * Split one stored line into fields. A field that opens with a double quote
 * and closes cleanly is unquoted (`""` is a literal quote); anything else is
 * taken as written, so lines from older unquoted files read back unchanged.
 */
export function splitExpenseLine(line: string): string[] {
  const fields: string[] = [];
  let start = 0;

  for (;;) {
    const quoted = line[start] === '"' ? readQuotedField(line, start) : null;
    if (quoted) {
      fields.push(quoted.value);
      start = quoted.end;
    } else {
      const comma = line.indexOf(',', start);
      const end = comma === -1 ? line.length : comma;
      fields.push(line.slice(start, end));
      start = end;
    }

    if (start >= line.length) break;
    start++; // past the comma
  }

  return fields;
}

function escapeField(value: string): string {
  const flat = value.replace(/\r\n|\r|\n/g, ' ');
  return /[",]/.test(flat) ? `"${flat.replace(/"/g, '""')}"` : flat;
}

export function formatExpenseLine(record: ExpenseRecord): string {
  return [
    escapeField(record.name),
    record.amount.toFixed(2),
    escapeField(record.category),
    escapeField(record.timestamp)
  ].join(',');
}

function parseAmount(text: string): number | null {
  if (text.trim() === '') return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function parseExpenseLine(line: string, now: Date = new Date()): ParsedLine {
  const fields = splitExpenseLine(line);
  if (fields.length < MIN_FIELDS) {
    return { ok: false, reason: 'too-few-fields' };
  }

  const [name, amountText, category, timestamp] = fields;
  const amount = parseAmount(amountText);
  if (amount === null) {
    return { ok: false, reason: 'bad-amount' };
  }

  return {
    ok: true,
    record: {
      name,
      amount,
      category,
      timestamp: timestamp ? timestamp : formatTimestamp(now)
    }
  };
}

export interface ExpenseStore {
  readonly filePath: string;
  load(): ExpenseRecord[];
  append(record: ExpenseRecord): void;
  overwrite(records: readonly ExpenseRecord[]): void;
  deleteAt(selection: Selection): DeleteResult;
}

export interface ExpenseStoreOptions {
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Flat-file record log, one expense per line. Every call reads or rewrites the
 * whole file synchronously; nothing guards against a second process writing
 * the same file between a load and the overwrite that follows it.
 */
export function createExpenseStore(filePath: string, options: ExpenseStoreOptions = {}): ExpenseStore {
  const logger = options.logger ?? console;
  const clock = options.clock ?? (() => new Date());

  function load(): ExpenseRecord[] {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        logger.info(`Expense file '${filePath}' not found. Starting with an empty store.`);
        return [];
      }
      throw error;
    }

    const records: ExpenseRecord[] = [];
    const now = clock();

    for (const rawLine of content.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line) continue;

      const parsed = parseExpenseLine(line, now);
      if (parsed.ok) {
        records.push(parsed.record);
      } else if (parsed.reason === 'bad-amount') {
        logger.warn(`Skipping malformed amount in line: ${line}`);
      } else {
        logger.warn(`Skipping malformed line with too few fields: ${line}`);
      }
    }

    return records;
  }

  function append(record: ExpenseRecord): void {
    fs.appendFileSync(filePath, `${formatExpenseLine(record)}\n`, 'utf-8');
  }

  function overwrite(records: readonly ExpenseRecord[]): void {
    const content = records.map(record => `${formatExpenseLine(record)}\n`).join('');
    fs.writeFileSync(filePath, content, 'utf-8');
  }

  function deleteAt(selection: Selection): DeleteResult {
    const records = load();
    if (records.length === 0) {
      return { status: 'empty' };
    }
    if (selection.kind === 'cancel') {
      return { status: 'cancelled' };
    }

    const index = selection.position - 1;
    if (!Number.isInteger(index) || index < 0 || index >= records.length) {
      return {
        status: 'invalid',
        message: `Invalid selection. Choose a number between 1 and ${records.length}.`
      };
    }

    const [record] = records.splice(index, 1);
    overwrite(records);

    return { status: 'deleted', record, remaining: records.length };
  }

  return { filePath, load, append, overwrite, deleteAt };
}

import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { PersistenceError, getErrorMessage, toError } from './errors';
import { log } from './log';
import type { RecordCodec, Row } from './records';
import type { AppendLog, Store } from './repository';

const rowsSchema = z.array(z.record(z.string()));

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Reads and decodes every record of a CSV file. A missing file reads as empty.
 */
export async function readCsv<T>(filePath: string, codec: RecordCodec<T>): Promise<T[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw new PersistenceError(`Cannot read ${path.basename(filePath)}: ${getErrorMessage(err)}`, filePath, toError(err));
  }

  let rows: Row[];
  try {
    const parsed: unknown = parse(content, { columns: true, skip_empty_lines: true, bom: true });
    rows = rowsSchema.parse(parsed);
  } catch (err) {
    throw new PersistenceError(`Malformed CSV in ${path.basename(filePath)}: ${getErrorMessage(err)}`, filePath, toError(err));
  }

  return rows.map((row, index) => {
    try {
      return codec.decode(row);
    } catch (err) {
      // +2: one for the header, one for 1-based numbering
      const detail = err instanceof z.ZodError
        ? err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        : getErrorMessage(err);
      throw new PersistenceError(`${path.basename(filePath)} row ${index + 2}: ${detail}`, filePath, toError(err));
    }
  });
}

function serialize<T>(codec: RecordCodec<T>, records: readonly T[], header: boolean): string {
  return stringify(records.map((record) => codec.encode(record)), {
    header,
    columns: [...codec.headers],
  });
}

/**
 * Replaces the file with the given records: written beside the target, then
 * renamed over it so a failed write never leaves a truncated file.
 */
export async function writeCsv<T>(filePath: string, codec: RecordCodec<T>, records: readonly T[]): Promise<void> {
  const tmp = `${filePath}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmp, serialize(codec, records, true), 'utf8');
    await fs.rename(tmp, filePath);
  } catch (err) {
    throw new PersistenceError(`Cannot write ${path.basename(filePath)}: ${getErrorMessage(err)}`, filePath, toError(err));
  }
}

/**
 * CSV-backed {@link Store}. The file is read on first access and rewritten
 * whole on {@link CsvStore.saveAll}.
 */
export class CsvStore<T> implements Store<T> {
  private cache: Map<string, T> | null = null;

  constructor(readonly filePath: string, private readonly codec: RecordCodec<T>) {}

  private async records(): Promise<Map<string, T>> {
    if (this.cache === null) {
      const loaded = await readCsv(this.filePath, this.codec);
      this.cache = new Map(loaded.map((record) => [this.codec.keyOf(record), record]));
      log({ level: 'info', action: 'store.load', file: path.basename(this.filePath), records: loaded.length });
    }
    return this.cache;
  }

  async loadAll(): Promise<T[]> {
    return [...(await this.records()).values()];
  }

  async findByKey(key: string): Promise<T | null> {
    return (await this.records()).get(key) ?? null;
  }

  async upsert(record: T): Promise<void> {
    (await this.records()).set(this.codec.keyOf(record), record);
  }

  async remove(key: string): Promise<boolean> {
    return (await this.records()).delete(key);
  }

  async saveAll(): Promise<void> {
    const records = await this.loadAll();
    await writeCsv(this.filePath, this.codec, records);
    log({ level: 'info', action: 'store.save', file: path.basename(this.filePath), records: records.length });
  }
}

/**
 * CSV-backed {@link AppendLog}. Appends add one row; the header is written
 * when the file is new or empty.
 */
export class CsvLog<T> implements AppendLog<T> {
  constructor(readonly filePath: string, private readonly codec: RecordCodec<T>) {}

  async loadAll(): Promise<T[]> {
    return readCsv(this.filePath, this.codec);
  }

  async append(record: T): Promise<void> {
    try {
      const size = await fs.stat(this.filePath).then((stat) => stat.size, (err: unknown) => {
        if (isMissingFile(err)) return 0;
        throw err;
      });
      await fs.appendFile(this.filePath, serialize(this.codec, [record], size === 0), 'utf8');
    } catch (err) {
      throw new PersistenceError(`Cannot append to ${path.basename(this.filePath)}: ${getErrorMessage(err)}`, this.filePath, toError(err));
    }
  }
}

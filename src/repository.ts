/**
 * Keyed record store. Mutations stay in memory until {@link Store.saveAll}
 * writes them to the backing medium.
 */
export interface Store<T> {
  loadAll(): Promise<T[]>;
  findByKey(key: string): Promise<T | null>;
  upsert(record: T): Promise<void>;
  /** Returns false when no record had the key. */
  remove(key: string): Promise<boolean>;
  saveAll(): Promise<void>;
}

/**
 * Append-only record log. Each append is durable on return.
 */
export interface AppendLog<T> {
  loadAll(): Promise<T[]>;
  append(record: T): Promise<void>;
}

export type KeyOf<T> = (record: T) => string;

/**
 * Store kept entirely in memory. Insertion order is preserved; an upsert of an
 * existing key keeps the record's position.
 */
export class MemoryStore<T> implements Store<T> {
  private readonly records = new Map<string, T>();
  saveCount = 0;

  constructor(private readonly keyOf: KeyOf<T>, initial: readonly T[] = []) {
    for (const record of initial) {
      this.records.set(keyOf(record), record);
    }
  }

  async loadAll(): Promise<T[]> {
    return [...this.records.values()];
  }

  async findByKey(key: string): Promise<T | null> {
    return this.records.get(key) ?? null;
  }

  async upsert(record: T): Promise<void> {
    this.records.set(this.keyOf(record), record);
  }

  async remove(key: string): Promise<boolean> {
    return this.records.delete(key);
  }

  async saveAll(): Promise<void> {
    this.saveCount += 1;
  }
}

export class MemoryLog<T> implements AppendLog<T> {
  private readonly records: T[];

  constructor(initial: readonly T[] = []) {
    this.records = [...initial];
  }

  async loadAll(): Promise<T[]> {
    return [...this.records];
  }

  async append(record: T): Promise<void> {
    this.records.push(record);
  }
}

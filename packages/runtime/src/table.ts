/**
 * Journaled state containers.
 *
 * Each subsystem keeps its state in tables registered with the
 * {@link ExecutionRuntime}. While an operation runs, a table records the
 * prior value of every key the first time the operation touches it; if the
 * operation throws, only those keys are put back. An operation that reads
 * one row of a large table copies that row and nothing else.
 *
 * Rows must be structured-cloneable plain data (objects, arrays, maps,
 * strings, numbers, bigints, booleans).
 *
 * @packageDocumentation
 */

/** Something whose changes during one operation can be kept or undone. */
export interface Journaled {
  /** Start recording prior values. */
  begin(): void;
  /** Keep every change made since {@link begin}. */
  commit(): void;
  /** Undo every change made since {@link begin}. */
  rollback(): void;
}

type PriorRow<V> = { present: true; value: V } | { present: false };

/** Row values are never `undefined`, so a missing row and an absent key coincide. */
type Row = NonNullable<unknown>;

/**
 * A keyed table of rows.
 *
 * `get` returns the live row, so callers may mutate it in place inside an
 * operation; a rollback discards those mutations together with any `set`
 * or `delete` calls made since the operation began.
 */
export class Table<K, V extends Row> implements Journaled {
  readonly name: string;
  private readonly rows = new Map<K, V>();
  private journal: Map<K, PriorRow<V>> | undefined;

  constructor(name: string) {
    this.name = name;
  }

  get(key: K): V | undefined {
    this.touch(key);
    return this.rows.get(key);
  }

  has(key: K): boolean {
    return this.rows.has(key);
  }

  set(key: K, value: V): void {
    this.touch(key);
    this.rows.set(key, value);
  }

  delete(key: K): boolean {
    this.touch(key);
    return this.rows.delete(key);
  }

  /** Iterate rows. Inside an operation every yielded row is journaled. */
  *values(): IterableIterator<V> {
    for (const [key, value] of this.rows) {
      this.touch(key);
      yield value;
    }
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, value] of this.rows) {
      this.touch(key);
      yield [key, value];
    }
  }

  get size(): number {
    return this.rows.size;
  }

  /** Number of keys recorded by the operation in progress. */
  get journaledKeys(): number {
    return this.journal?.size ?? 0;
  }

  begin(): void {
    this.journal = new Map();
  }

  commit(): void {
    this.journal = undefined;
  }

  rollback(): void {
    const journal = this.journal;
    this.journal = undefined;
    if (journal === undefined) return;
    for (const [key, prior] of journal) {
      if (prior.present) {
        this.rows.set(key, prior.value);
      } else {
        this.rows.delete(key);
      }
    }
  }

  private touch(key: K): void {
    const journal = this.journal;
    if (journal === undefined || journal.has(key)) return;
    const row = this.rows.get(key);
    journal.set(key, row === undefined ? { present: false } : { present: true, value: structuredClone(row) });
  }
}

/** A single journaled value (flags, counters). */
export class Cell<T> implements Journaled {
  readonly name: string;
  private value: T;
  private prior: { value: T } | undefined;
  private journaling = false;

  constructor(name: string, initial: T) {
    this.name = name;
    this.value = initial;
  }

  get(): T {
    this.touch();
    return this.value;
  }

  set(value: T): void {
    this.touch();
    this.value = value;
  }

  begin(): void {
    this.journaling = true;
    this.prior = undefined;
  }

  commit(): void {
    this.journaling = false;
    this.prior = undefined;
  }

  rollback(): void {
    if (this.prior !== undefined) {
      this.value = this.prior.value;
    }
    this.commit();
  }

  private touch(): void {
    if (this.journaling && this.prior === undefined) {
      this.prior = { value: structuredClone(this.value) };
    }
  }
}

/** A monotonically increasing identifier source starting at 1. */
export class Sequence implements Journaled {
  readonly name: string;
  private last = 0;
  private saved = 0;

  constructor(name: string) {
    this.name = name;
  }

  /** Allocate the next identifier. */
  next(): number {
    this.last += 1;
    return this.last;
  }

  /** The most recently allocated identifier (0 when none). */
  current(): number {
    return this.last;
  }

  begin(): void {
    this.saved = this.last;
  }

  commit(): void {
    this.saved = this.last;
  }

  rollback(): void {
    this.last = this.saved;
  }
}

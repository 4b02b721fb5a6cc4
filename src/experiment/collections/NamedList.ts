import type { FieldContainer } from './types.js';

/**
 * Named entries of a list slot. Entry values are arbitrary; linkable ones
 * are vectors or collections.
 */
export class NamedList<T = unknown> implements FieldContainer<NamedList<T>> {
  private readonly entries: ReadonlyMap<string, T>;

  constructor(entries: Iterable<readonly [string, T]> = []) {
    this.entries = new Map(entries);
  }

  static fromRecord<T>(record: Record<string, T>): NamedList<T> {
    return new NamedList(Object.entries(record));
  }

  get size(): number {
    return this.entries.size;
  }

  fieldNames(): string[] {
    return [...this.entries.keys()];
  }

  getField(name: string): T | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  withField(name: string, value: T): NamedList<T> {
    const entries = new Map(this.entries);
    entries.set(name, value);
    return new NamedList(entries);
  }

  toRecord(): Record<string, T> {
    return Object.fromEntries(this.entries);
  }
}

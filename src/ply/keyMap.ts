export interface Named {
  readonly name: string;
}

export interface ReadonlyKeyMap<V extends Named> extends Iterable<V> {
  readonly size: number;
  has(name: string): boolean;
  get(name: string): V | undefined;
  keys(): IterableIterator<string>;
  values(): IterableIterator<V>;
  last(): V | undefined;
}

/**
 * Insertion-ordered map keyed by each value's own name. Payload column order
 * follows this order, so values are never re-inserted.
 */
export class KeyMap<V extends Named> implements ReadonlyKeyMap<V> {
  private readonly entries = new Map<string, V>();
  private lastValue: V | undefined;

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): V | undefined {
    return this.entries.get(name);
  }

  /** Returns false, leaving the map untouched, when the name is taken. */
  add(value: V): boolean {
    if (this.entries.has(value.name)) {
      return false;
    }
    this.entries.set(value.name, value);
    this.lastValue = value;
    return true;
  }

  last(): V | undefined {
    return this.lastValue;
  }

  keys(): IterableIterator<string> {
    return this.entries.keys();
  }

  values(): IterableIterator<V> {
    return this.entries.values();
  }

  [Symbol.iterator](): IterableIterator<V> {
    return this.entries.values();
  }
}

/**
 * Header collections.
 *
 * @module http/headers
 */

import { HttpHeader } from './header.js';

/**
 * An immutable set of {@link HttpHeader} values.
 *
 * Membership is decided by the `(key, value)` pair, so inserting a pair that is
 * already present leaves its size unchanged, while two headers sharing a key
 * with different values are both kept. Every update returns a new set.
 *
 * Iteration follows the order of the latest insertion of each pair. The order has no bearing on equality, but
 * it decides which value survives when the set is flattened with
 * {@link HeaderSet.toRecord}.
 *
 * @example
 * ```typescript
 * const headers = HeaderSet.of(HttpHeader.accept('application/json'))
 *   .inserting(HttpHeader.accept('text/plain'))
 *   .inserting(HttpHeader.accept('application/json'));
 *
 * headers.size; // 2
 * ```
 */
export class HeaderSet implements Iterable<HttpHeader> {
  static readonly empty = new HeaderSet(new Map());

  private readonly entries: ReadonlyMap<string, HttpHeader>;

  private constructor(entries: ReadonlyMap<string, HttpHeader>) {
    this.entries = entries;
  }

  static of(...headers: HttpHeader[]): HeaderSet {
    return HeaderSet.from(headers);
  }

  static from(headers: Iterable<HttpHeader>): HeaderSet {
    const entries = new Map<string, HttpHeader>();
    for (const header of headers) {
      entries.delete(header.hashKey());
      entries.set(header.hashKey(), header);
    }
    return new HeaderSet(entries);
  }

  /**
   * Reads a flat header table back into a set, one header per entry.
   */
  static fromRecord(record: Readonly<Record<string, string>>): HeaderSet {
    return HeaderSet.from(
      Object.entries(record).map(([key, value]) => new HttpHeader(key, value))
    );
  }

  get size(): number {
    return this.entries.size;
  }

  get isEmpty(): boolean {
    return this.entries.size === 0;
  }

  has(header: HttpHeader): boolean {
    return this.entries.has(header.hashKey());
  }

  /**
   * Values of every header whose key matches `name`, ignoring case.
   */
  valuesFor(name: string): string[] {
    return this.toArray()
      .filter((header) => header.hasKey(name))
      .map((header) => header.value);
  }

  inserting(...headers: HttpHeader[]): HeaderSet {
    const entries = new Map(this.entries);
    for (const header of headers) {
      // Re-inserting a pair moves it to the end, so it counts as the latest write
      entries.delete(header.hashKey());
      entries.set(header.hashKey(), header);
    }
    return new HeaderSet(entries);
  }

  removing(header: HttpHeader): HeaderSet {
    if (!this.has(header)) {
      return this;
    }
    const entries = new Map(this.entries);
    entries.delete(header.hashKey());
    return new HeaderSet(entries);
  }

  /**
   * Drops every header whose key matches `name`, ignoring case.
   */
  removingKey(name: string): HeaderSet {
    return HeaderSet.from(this.toArray().filter((header) => !header.hasKey(name)));
  }

  union(other: HeaderSet): HeaderSet {
    return this.inserting(...other);
  }

  equals(other: HeaderSet): boolean {
    if (this.size !== other.size) {
      return false;
    }
    return this.toArray().every((header) => other.has(header));
  }

  toArray(): HttpHeader[] {
    return Array.from(this.entries.values());
  }

  /**
   * Flattens the set onto a key→value table.
   *
   * This step is lossy: keys are compared case-insensitively and, for headers
   * sharing a key, the one inserted last wins, spelling of the key included.
   */
  toRecord(): Record<string, string> {
    const flattened = new Map<string, HttpHeader>();
    for (const header of this.entries.values()) {
      const normalized = header.key.toLowerCase();
      flattened.delete(normalized);
      flattened.set(normalized, header);
    }

    return Object.fromEntries(
      Array.from(flattened.values(), (header): [string, string] => [header.key, header.value])
    );
  }

  [Symbol.iterator](): Iterator<HttpHeader> {
    return this.entries.values();
  }
}

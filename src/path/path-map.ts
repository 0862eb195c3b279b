// src/path/path-map.ts
import type { ResponsePath } from "./response-path";

/**
 * Insertion-ordered map keyed structurally by ResponsePath.
 * Two separately built paths with the same segments address the same entry.
 */
export class PathMap<V> {
  private entriesByKey = new Map<string, { path: ResponsePath; value: V }>();

  static from<V>(entries: Iterable<readonly [ResponsePath, V]>): PathMap<V> {
    const map = new PathMap<V>();
    for (const [path, value] of entries) {
      map.set(path, value);
    }
    return map;
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(path: ResponsePath): V | undefined {
    return this.entriesByKey.get(path.key)?.value;
  }

  has(path: ResponsePath): boolean {
    return this.entriesByKey.has(path.key);
  }

  set(path: ResponsePath, value: V): this {
    this.entriesByKey.set(path.key, { path, value });
    return this;
  }

  delete(path: ResponsePath): boolean {
    return this.entriesByKey.delete(path.key);
  }

  clear(): void {
    this.entriesByKey.clear();
  }

  *entries(): IterableIterator<[ResponsePath, V]> {
    for (const { path, value } of this.entriesByKey.values()) {
      yield [path, value];
    }
  }

  *keys(): IterableIterator<ResponsePath> {
    for (const { path } of this.entriesByKey.values()) {
      yield path;
    }
  }

  *values(): IterableIterator<V> {
    for (const { value } of this.entriesByKey.values()) {
      yield value;
    }
  }

  [Symbol.iterator](): IterableIterator<[ResponsePath, V]> {
    return this.entries();
  }

  /** Plain object keyed by the dotted display form, for assertions and debug output */
  toRecord(): Record<string, V> {
    const record: Record<string, V> = {};
    for (const [path, value] of this.entries()) {
      record[path.display()] = value;
    }
    return record;
  }
}

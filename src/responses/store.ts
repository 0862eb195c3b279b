// src/responses/store.ts
import { PathMap, type ResponsePath } from "@/path";

import { ResponseError } from "./errors";
import type { ResponseValue, ResponseValueOf, ResponseValueType } from "./types";
import { cloneValue } from "./value";

/**
 * Read side of a response store. Validators and reconstruction only ever see this.
 */
export interface ReadonlyResponses {
  readonly size: number;
  get(path: ResponsePath): ResponseValue | undefined;
  has(path: ResponsePath): boolean;
  hasValue(path: ResponsePath): boolean;
  entries(): IterableIterator<[ResponsePath, ResponseValue]>;
  filterPrefix(prefix: ResponsePath): Responses;
  clone(): Responses;
  getText(path: ResponsePath): string;
  getInt(path: ResponsePath): number;
  getFloat(path: ResponsePath): number;
  getBool(path: ResponsePath): boolean;
  getChosenVariant(path: ResponsePath): number;
  getChosenVariants(path: ResponsePath): readonly number[];
  getTextList(path: ResponsePath): readonly string[];
  getIntList(path: ResponsePath): readonly number[];
  getFloatList(path: ResponsePath): readonly number[];
}

/**
 * Collected answers of one survey run, keyed by ResponsePath.
 * Keys are flat: a nested field is stored under its full path.
 */
export class Responses implements ReadonlyResponses {
  private values = new PathMap<ResponseValue>();

  static from(entries: Iterable<readonly [ResponsePath, ResponseValue]>): Responses {
    const responses = new Responses();
    for (const [path, value] of entries) {
      responses.insert(path, value);
    }
    return responses;
  }

  get size(): number {
    return this.values.size;
  }

  get(path: ResponsePath): ResponseValue | undefined {
    return this.values.get(path);
  }

  has(path: ResponsePath): boolean {
    return this.values.has(path);
  }

  /** False for a missing path or empty text, i.e. a skipped optional field */
  hasValue(path: ResponsePath): boolean {
    const value = this.values.get(path);
    if (!value) return false;
    return value.type !== "text" || value.value !== "";
  }

  insert(path: ResponsePath, value: ResponseValue): void {
    this.values.set(path, cloneValue(value));
  }

  remove(path: ResponsePath): ResponseValue | undefined {
    const value = this.values.get(path);
    this.values.delete(path);
    return value;
  }

  /** Copies every entry of `other` in, overwriting on conflict */
  extend(other: ReadonlyResponses): void {
    for (const [path, value] of other.entries()) {
      this.insert(path, value);
    }
  }

  entries(): IterableIterator<[ResponsePath, ResponseValue]> {
    return this.values.entries();
  }

  clone(): Responses {
    return Responses.from(this.values.entries());
  }

  /**
   * Entries under `prefix`, with the prefix removed from each key.
   * Hands a nested schema's reconstruction exactly its own namespace.
   */
  filterPrefix(prefix: ResponsePath): Responses {
    const filtered = new Responses();
    for (const [path, value] of this.values.entries()) {
      const stripped = path.stripPathPrefix(prefix);
      if (stripped && !stripped.isEmpty()) {
        filtered.insert(stripped, value);
      }
    }
    return filtered;
  }

  getText(path: ResponsePath): string {
    return this.expect(path, "text").value;
  }

  getInt(path: ResponsePath): number {
    return this.expect(path, "int").value;
  }

  getFloat(path: ResponsePath): number {
    return this.expect(path, "float").value;
  }

  getBool(path: ResponsePath): boolean {
    return this.expect(path, "bool").value;
  }

  getChosenVariant(path: ResponsePath): number {
    return this.expect(path, "chosen_variant").index;
  }

  getChosenVariants(path: ResponsePath): readonly number[] {
    return this.expect(path, "chosen_variants").indices;
  }

  getTextList(path: ResponsePath): readonly string[] {
    return this.expect(path, "text_list").values;
  }

  getIntList(path: ResponsePath): readonly number[] {
    return this.expect(path, "int_list").values;
  }

  getFloatList(path: ResponsePath): readonly number[] {
    return this.expect(path, "float_list").values;
  }

  private expect<T extends ResponseValueType>(path: ResponsePath, type: T): ResponseValueOf<T> {
    const value = this.values.get(path);
    if (!value) throw ResponseError.missing(path);
    if (!isValueOfType(value, type)) throw ResponseError.mismatch(path, type, value.type);
    return value;
  }
}

export function isValueOfType<T extends ResponseValueType>(value: ResponseValue, type: T): value is ResponseValueOf<T> {
  return value.type === type;
}

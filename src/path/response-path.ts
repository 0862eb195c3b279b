// src/path/response-path.ts

/**
 * Address of one response inside a (possibly nested) survey, e.g. `address.street`.
 *
 * Paths are immutable values compared segment by segment. The dotted form returned by
 * `toString()` is for diagnostics only; the core never parses it back.
 */
export class ResponsePath {
  private static readonly EMPTY = new ResponsePath([]);

  private constructor(private readonly parts: readonly string[]) {}

  /** The empty path, used as the prefix of top-level questions */
  static empty(): ResponsePath {
    return ResponsePath.EMPTY;
  }

  static root(name: string): ResponsePath {
    return ResponsePath.EMPTY.child(name);
  }

  static of(...segments: string[]): ResponsePath {
    return segments.reduce((path, segment) => path.child(segment), ResponsePath.EMPTY);
  }

  /**
   * Builds a path from a hand-typed dotted key such as `"server.port"`.
   * Only for keys written by people (config files, builder calls).
   */
  static fromDotted(dotted: string): ResponsePath {
    return ResponsePath.of(...dotted.split("."));
  }

  get segments(): readonly string[] {
    return this.parts;
  }

  get length(): number {
    return this.parts.length;
  }

  /** Canonical map key. Never shown to users */
  get key(): string {
    return JSON.stringify(this.parts);
  }

  isEmpty(): boolean {
    return this.parts.length === 0;
  }

  child(name: string): ResponsePath {
    if (name === "") return this;
    return new ResponsePath([...this.parts, name]);
  }

  concat(other: ResponsePath): ResponsePath {
    if (other.isEmpty()) return this;
    if (this.isEmpty()) return other;
    return new ResponsePath([...this.parts, ...other.parts]);
  }

  first(): string | undefined {
    return this.parts[0];
  }

  last(): string | undefined {
    return this.parts[this.parts.length - 1];
  }

  parent(): ResponsePath {
    if (this.parts.length <= 1) return ResponsePath.EMPTY;
    return new ResponsePath(this.parts.slice(0, -1));
  }

  /** Drops the leading segment if it equals `name` */
  stripPrefix(name: string): ResponsePath | undefined {
    if (this.parts[0] !== name) return undefined;
    return this.parts.length === 1 ? ResponsePath.EMPTY : new ResponsePath(this.parts.slice(1));
  }

  stripPathPrefix(prefix: ResponsePath): ResponsePath | undefined {
    if (!this.startsWith(prefix)) return undefined;
    if (prefix.length === this.parts.length) return ResponsePath.EMPTY;
    return new ResponsePath(this.parts.slice(prefix.length));
  }

  startsWith(prefix: ResponsePath): boolean {
    if (prefix.length > this.parts.length) return false;
    return prefix.parts.every((segment, i) => this.parts[i] === segment);
  }

  equals(other: ResponsePath): boolean {
    return this.parts.length === other.parts.length && this.startsWith(other);
  }

  display(): string {
    return this.parts.join(".");
  }

  toString(): string {
    return this.display();
  }
}

/**
 * A header field is stored as a single value until the same name shows up
 * again, at which point it becomes an ordered list. A list never holds
 * fewer than two values.
 */
export type HeaderValue =
  | { kind: 'single'; value: string }
  | { kind: 'multiple'; values: string[] };

export type HeaderRecord = Record<string, string | string[]>;

export class ResponseHeaders implements Iterable<[string, string | string[]]> {
  private readonly fields = new Map<string, HeaderValue>();

  static from(pairs: Iterable<readonly [string, string]>): ResponseHeaders {
    const headers = new ResponseHeaders();
    for (const [name, value] of pairs) {
      headers.append(name, value);
    }
    return headers;
  }

  append(name: string, value: string): void {
    const key = name.toLowerCase();
    const existing = this.fields.get(key);
    if (!existing) {
      this.fields.set(key, { kind: 'single', value });
      return;
    }
    if (existing.kind === 'single') {
      this.fields.set(key, { kind: 'multiple', values: [existing.value, value] });
      return;
    }
    existing.values.push(value);
  }

  get(name: string): string | string[] | undefined {
    const field = this.fields.get(name.toLowerCase());
    if (!field) {
      return undefined;
    }
    return field.kind === 'single' ? field.value : [...field.values];
  }

  getAll(name: string): string[] {
    const field = this.fields.get(name.toLowerCase());
    if (!field) {
      return [];
    }
    return field.kind === 'single' ? [field.value] : [...field.values];
  }

  has(name: string): boolean {
    return this.fields.has(name.toLowerCase());
  }

  get size(): number {
    return this.fields.size;
  }

  keys(): string[] {
    return Array.from(this.fields.keys());
  }

  toRecord(): HeaderRecord {
    return Object.fromEntries(this);
  }

  *[Symbol.iterator](): Iterator<[string, string | string[]]> {
    for (const [name, field] of this.fields) {
      yield [name, field.kind === 'single' ? field.value : [...field.values]];
    }
  }
}

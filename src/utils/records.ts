import { formatKstDate } from "./dates.js";

// ─── Field lists ────────────────────────────────────────────────────

/** Ordered (property, label) pairs describing one record type. */
export type FieldList<T> = ReadonlyArray<
  { [K in keyof T & string]: readonly [K, string] }[keyof T & string]
>;

/** JSON-safe field value; dates are rendered as ISO strings. */
export type PlainValue = string | number | boolean | null | readonly string[];

function toPlain(value: unknown): PlainValue {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) return value.map(String);
  return String(value);
}

function display(value: unknown): string {
  if (value === null || value === undefined) return "-";
  if (value instanceof Date) return formatKstDate(value);
  if (typeof value === "boolean") return value ? "Y" : "N";
  if (Array.isArray(value)) return value.length > 0 ? value.join(", ") : "-";
  return String(value);
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

/**
 * Describes a record type once; object conversion, rendering and
 * equality all walk the same field list.
 */
export class RecordKind<T extends object> {
  constructor(
    readonly name: string,
    readonly fields: FieldList<T>
  ) {}

  entries(record: T): Array<[keyof T & string, T[keyof T & string]]> {
    return this.fields.map(([key]): [keyof T & string, T[keyof T & string]] => [key, record[key]]);
  }

  /** Ordered field-name → value mapping, safe for JSON.stringify. */
  toObject(record: T): Record<string, PlainValue> {
    const result: Record<string, PlainValue> = {};
    for (const [key] of this.fields) result[key] = toPlain(record[key]);
    return result;
  }

  /** Multi-line rendering: a header line, then one `Label: value` line per field. */
  format(record: T): string {
    const lines = this.fields.map(([key, label]) => `  ${label}: ${display(record[key])}`);
    return [this.name, ...lines].join("\n");
  }

  equals(a: T, b: T): boolean {
    return this.fields.every(([key]) => sameValue(a[key], b[key]));
  }
}

// ─── Record lists ───────────────────────────────────────────────────

/** Read-only ordered sequence of records, in document order. */
export class RecordList<T> implements Iterable<T> {
  private readonly items: readonly T[];

  constructor(items: readonly T[]) {
    this.items = Object.freeze([...items]);
  }

  get length(): number {
    return this.items.length;
  }

  /** Item at a position; negative indexes count from the end. */
  at(index: number): T | undefined {
    return this.items.at(index);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  toArray(): T[] {
    return [...this.items];
  }

  map<U>(fn: (item: T, index: number) => U): U[] {
    return this.items.map(fn);
  }
}

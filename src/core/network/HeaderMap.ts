/**
 * Raw header record as handed out by HTTP clients. Scalars become one entry,
 * arrays (set-cookie) one entry per item; anything else is skipped.
 */
export type RawHeaders = Record<string, unknown>;

/**
 * HeaderMap - Immutable, ordered header multimap with case-insensitive lookup.
 * Original casing and arrival order are kept for reporting.
 */
export class HeaderMap {
  private readonly entryList: ReadonlyArray<readonly [string, string]>;

  constructor(entries: Iterable<readonly [string, string]> = []) {
    this.entryList = Object.freeze(
      Array.from(entries, ([name, value]) => Object.freeze([name, value] as const))
    );
  }

  /**
   * Builds a map from a plain header record, expanding array values into
   * repeated entries.
   */
  public static fromRecord(record: RawHeaders): HeaderMap {
    const entries: Array<[string, string]> = [];

    for (const [name, value] of Object.entries(record)) {
      if (Array.isArray(value)) {
        for (const item of value) {
          if (isScalar(item)) entries.push([name, String(item)]);
        }
      } else if (isScalar(value)) {
        entries.push([name, String(value)]);
      }
    }

    return new HeaderMap(entries);
  }

  /**
   * First value for the header, if any
   */
  public get(name: string): string | undefined {
    const wanted = name.toLowerCase();
    const entry = this.entryList.find(([key]) => key.toLowerCase() === wanted);
    return entry ? entry[1] : undefined;
  }

  public getAll(name: string): string[] {
    const wanted = name.toLowerCase();
    return this.entryList.filter(([key]) => key.toLowerCase() === wanted).map(([, value]) => value);
  }

  public has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  public entries(): ReadonlyArray<readonly [string, string]> {
    return this.entryList;
  }

  public get size(): number {
    return this.entryList.length;
  }

  /**
   * Plain object view; repeated headers are joined with ", "
   */
  public toJSON(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, value] of this.entryList) {
      const key = name.toLowerCase();
      result[key] = key in result ? `${result[key]}, ${value}` : value;
    }
    return result;
  }
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

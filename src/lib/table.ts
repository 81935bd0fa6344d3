import type { Cell, NormalizedRecord } from "./types";

/**
 * In-memory result of saveData(category, "df"). Rows keep the order in which
 * products were scraped. When `index` is set it holds one label per row
 * (product names) and is not part of `columns`.
 */
export class ProductTable {
  readonly columns: readonly string[];
  readonly index: readonly string[] | null;
  readonly indexName: string | null;
  private readonly data: readonly Readonly<NormalizedRecord>[];

  constructor(
    columns: string[],
    rows: NormalizedRecord[],
    index?: { name: string; labels: string[] }
  ) {
    if (index && index.labels.length !== rows.length) {
      throw new RangeError(`Index has ${index.labels.length} labels for ${rows.length} rows`);
    }
    this.columns = Object.freeze([...columns]);
    this.data = Object.freeze(rows.map((row) => Object.freeze(pick(row, columns))));
    this.index = index ? Object.freeze([...index.labels]) : null;
    this.indexName = index ? index.name : null;
  }

  get length(): number {
    return this.data.length;
  }

  get rows(): readonly Readonly<NormalizedRecord>[] {
    return this.data;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  row(position: number): Readonly<NormalizedRecord> {
    const found = this.data[position];
    if (!found) throw new RangeError(`Row ${position} out of range (0..${this.data.length - 1})`);
    return found;
  }

  /** Row by index label; only available when the table has an index. */
  loc(label: string): Readonly<NormalizedRecord> | undefined {
    if (!this.index) return undefined;
    const position = this.index.indexOf(label);
    return position === -1 ? undefined : this.data[position];
  }

  column(name: string): Cell[] {
    if (!this.columns.includes(name)) throw new RangeError(`Unknown column: ${name}`);
    return this.data.map((row) => row[name] ?? null);
  }

  /** Header for file output: the index name first when there is one. */
  outputColumns(): string[] {
    return this.indexName ? [this.indexName, ...this.columns] : [...this.columns];
  }

  /** Plain rows for file output, index label included as the first field. */
  toRecords(): NormalizedRecord[] {
    return this.data.map((row, i) => {
      if (!this.index || !this.indexName) return { ...row };
      return { [this.indexName]: this.index[i], ...row };
    });
  }
}

function pick(row: NormalizedRecord, columns: string[]): NormalizedRecord {
  const out: NormalizedRecord = {};
  for (const column of columns) {
    out[column] = row[column] ?? null;
  }
  return out;
}

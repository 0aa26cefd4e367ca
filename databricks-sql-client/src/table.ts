import { ConversionError } from './errors.js';
import type { Row, SqlValue } from './types.js';

export type TableRow = readonly SqlValue[];

/**
 * In-memory result table: ordered, named columns over ordered rows.
 */
export class DataTable {
  readonly columns: readonly string[];
  // Frozen: a row that changed width would no longer line up with the columns
  readonly rows: readonly TableRow[];

  private constructor(columns: readonly string[], rows: readonly TableRow[]) {
    this.columns = Object.freeze([...columns]);
    this.rows = Object.freeze(rows.map((row) => Object.freeze([...row])));
  }

  /**
   * Build a table from fetched rows and the result's column names.
   * Every row must be exactly as wide as the column list.
   */
  static fromRows(rows: Row[], columns: string[]): DataTable {
    rows.forEach((row, index) => {
      if (row.length !== columns.length) {
        throw new ConversionError(
          `Row ${index} has ${row.length} values but the result has ${columns.length} columns`,
          { row: index, width: row.length, columns: columns.length }
        );
      }
    });

    return new DataTable(columns, rows);
  }

  get rowCount(): number {
    return this.rows.length;
  }

  /** [rows, columns] */
  get shape(): [number, number] {
    return [this.rows.length, this.columns.length];
  }

  column(name: string): SqlValue[] {
    const index = this.columns.indexOf(name);
    if (index === -1) {
      throw new Error(`Unknown column: ${name}`);
    }
    return this.rows.map((row) => row[index]);
  }

  head(count: number = 5): DataTable {
    return new DataTable(this.columns, this.rows.slice(0, Math.max(0, count)));
  }

  toRecords(): Record<string, SqlValue>[] {
    return this.rows.map((row) =>
      Object.fromEntries(this.columns.map((name, i) => [name, row[i]]))
    );
  }

  toColumns(): Record<string, SqlValue[]> {
    return Object.fromEntries(
      this.columns.map((name, i) => [name, this.rows.map((row) => row[i])])
    );
  }

  /**
   * Fixed-width text rendering, one line per row under a header line
   */
  toString(): string {
    if (this.columns.length === 0) {
      return '(no columns)';
    }

    const cells = this.rows.map((row) => row.map(formatValue));
    const widths = this.columns.map((name, i) =>
      Math.max(name.length, ...cells.map((line) => line[i].length))
    );
    const render = (values: string[]) =>
      values.map((value, i) => value.padEnd(widths[i])).join('  ').trimEnd();

    return [render([...this.columns]), ...cells.map(render)].join('\n');
  }
}

export function formatValue(value: SqlValue): string {
  if (value === null || value === undefined) return 'null';
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  if (typeof value === 'object') {
    return JSON.stringify(value, jsonReplacer);
  }
  return String(value);
}

/**
 * JSON.stringify replacer; BIGINT columns arrive as bigint, which JSON cannot hold
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

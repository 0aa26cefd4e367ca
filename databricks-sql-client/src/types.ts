export interface ConnectionParams {
  hostname: string;      // e.g. adb-1234567890123456.7.azuredatabricks.net
  httpPath: string;      // e.g. /sql/1.0/warehouses/abc123
  accessToken: string;
  // Advisory: forwarded as the session's initial catalog/schema
  catalog?: string;
  schema?: string;
}

export type SqlValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | null
  | undefined
  | Uint8Array
  | SqlValue[]
  | { [key: string]: SqlValue };

export type Row = SqlValue[];

export interface QueryResult {
  rows: Row[];
  columns: string[];
}

export interface Logger {
  log(message: string): void;
  error(message: string): void;
}

import { DatabricksConnection, type ConnectionOptions } from './client.js';
import type { DataTable } from './table.js';
import type { ConnectionParams, Row } from './types.js';

export interface PullOptions extends ConnectionParams, ConnectionOptions {
  query: string;
  /** Shape the result into a DataTable (default) or return raw rows */
  asTable?: boolean;
}

/**
 * Connect, run one query and disconnect.
 * The connection is closed on every exit path; when the query itself failed,
 * a failure while closing is reported but the original error is what throws.
 */
export async function pullDatabricksData(options: PullOptions & { asTable?: true }): Promise<DataTable>;
export async function pullDatabricksData(options: PullOptions & { asTable: false }): Promise<Row[]>;
export async function pullDatabricksData(options: PullOptions): Promise<DataTable | Row[]>;
export async function pullDatabricksData(options: PullOptions): Promise<DataTable | Row[]> {
  const { query, asTable = true, driver, logger, openInNamespace, ...params } = options;
  const db = new DatabricksConnection(params, { driver, logger, openInNamespace });
  let failed = false;

  try {
    await db.connect();
    return asTable ? await db.queryToTable(query) : await db.executeQuery(query);
  } catch (error) {
    failed = true;
    throw error;
  } finally {
    await db.close().catch((closeError: unknown) => {
      // close() has already reported it
      if (!failed) throw closeError;
    });
  }
}

export { DatabricksConnection } from './client.js';
export type { ConnectionOptions } from './client.js';
export { DataTable, formatValue, jsonReplacer } from './table.js';
export {
  assertConnectionParams,
  describeConnectionParams,
  loadConnectionParams
} from './connection.js';
export {
  assertUniqueColumns,
  createDatabricksDriver,
  recordToRow
} from './clients/databricks-driver.js';
export type {
  CursorOptions,
  DatabricksClientLike,
  DriverConnectOptions,
  WarehouseConnection,
  WarehouseCursor,
  WarehouseDriver,
  WarehouseStatement
} from './clients/databricks-driver.js';
export { runStatement } from './helpers/execute.js';
export {
  ConfigurationError,
  ConnectionError,
  ConversionError,
  DatabricksClientError,
  QueryError
} from './errors.js';
export type { TableRow } from './table.js';
export type { ConnectionParams, Logger, QueryResult, Row, SqlValue } from './types.js';

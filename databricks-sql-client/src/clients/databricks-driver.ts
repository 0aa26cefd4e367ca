import { DBSQLClient } from '@databricks/sql';
import { ConversionError } from '../errors.js';
import type { Row, SqlValue } from '../types.js';

/*
 * The warehouse boundary. The connection handle only ever talks to these
 * interfaces; createDatabricksDriver() backs them with @databricks/sql.
 */

export interface DriverConnectOptions {
  host: string;
  path: string;
  token: string;
}

export interface CursorOptions {
  catalog?: string;
  schema?: string;
}

export interface WarehouseStatement {
  fetchAll(): Promise<Row[]>;
  columnNames(): Promise<string[]>;
  close(): Promise<void>;
}

export interface WarehouseCursor {
  execute(query: string): Promise<WarehouseStatement>;
  close(): Promise<void>;
}

export interface WarehouseConnection {
  openCursor(options?: CursorOptions): Promise<WarehouseCursor>;
  close(): Promise<void>;
}

export interface WarehouseDriver {
  connect(options: DriverConnectOptions): Promise<WarehouseConnection>;
}

// The parts of the @databricks/sql client surface this module relies on.
// DBSQLClient satisfies them structurally.

interface ColumnDescLike {
  columnName: string;
  position: number;
}

export interface DatabricksOperationLike {
  fetchAll(): Promise<object[]>;
  getSchema(): Promise<{ columns: ColumnDescLike[] } | null>;
  close(): Promise<unknown>;
}

export interface DatabricksSessionLike {
  executeStatement(statement: string): Promise<DatabricksOperationLike>;
  close(): Promise<unknown>;
}

export interface DatabricksClientLike {
  connect(options: DriverConnectOptions): Promise<unknown>;
  openSession(request?: { initialCatalog?: string; initialSchema?: string }): Promise<DatabricksSessionLike>;
  close(): Promise<unknown>;
}

/**
 * Records are keyed by column name, so a result whose columns share a name
 * has already lost values by the time it reaches us.
 */
export function assertUniqueColumns(columns: string[]): void {
  const duplicated = columns.filter((name, i) => columns.indexOf(name) !== i);
  if (duplicated.length > 0) {
    const names = [...new Set(duplicated)];
    throw new ConversionError(
      `Result has duplicate column names: ${names.join(', ')}. Alias them to make each name unique.`,
      { duplicated: names }
    );
  }
}

/**
 * Turn a driver record into a tuple ordered like the result's columns
 */
export function recordToRow(record: object, columns: string[]): Row {
  const fields: Map<string, SqlValue> = new Map(Object.entries(record));
  if (columns.length === 0) {
    return Array.from(fields.values());
  }

  assertUniqueColumns(columns);
  const missing = columns.filter((name) => !fields.has(name));
  if (missing.length > 0) {
    throw new ConversionError(`Row is missing columns: ${missing.join(', ')}`, { missing });
  }
  return columns.map((name) => fields.get(name));
}

class DatabricksStatement implements WarehouseStatement {
  private columns: string[] | null = null;

  constructor(private readonly operation: DatabricksOperationLike) {}

  async columnNames(): Promise<string[]> {
    if (this.columns === null) {
      const schema = await this.operation.getSchema();
      this.columns = [...(schema?.columns ?? [])]
        .sort((a, b) => a.position - b.position)
        .map((column) => column.columnName);
    }
    return this.columns;
  }

  async fetchAll(): Promise<Row[]> {
    const columns = await this.columnNames();
    assertUniqueColumns(columns);
    const records = await this.operation.fetchAll();
    return records.map((record) => recordToRow(record, columns));
  }

  async close(): Promise<void> {
    await this.operation.close();
  }
}

class DatabricksCursor implements WarehouseCursor {
  constructor(private readonly session: DatabricksSessionLike) {}

  async execute(query: string): Promise<WarehouseStatement> {
    const operation = await this.session.executeStatement(query);
    return new DatabricksStatement(operation);
  }

  async close(): Promise<void> {
    await this.session.close();
  }
}

class DatabricksWarehouseConnection implements WarehouseConnection {
  constructor(private readonly client: DatabricksClientLike) {}

  async openCursor(options: CursorOptions = {}): Promise<WarehouseCursor> {
    const session = await this.client.openSession({
      ...(options.catalog ? { initialCatalog: options.catalog } : {}),
      ...(options.schema ? { initialSchema: options.schema } : {})
    });
    return new DatabricksCursor(session);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/**
 * Driver backed by @databricks/sql, authenticating with a personal access token
 */
export function createDatabricksDriver(
  createClient: () => DatabricksClientLike = () => new DBSQLClient()
): WarehouseDriver {
  return {
    async connect(options: DriverConnectOptions): Promise<WarehouseConnection> {
      const client = createClient();
      await client.connect({
        host: options.host,
        path: options.path,
        token: options.token
      });
      return new DatabricksWarehouseConnection(client);
    }
  };
}

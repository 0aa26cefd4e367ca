/**
 * Connection handle for a Databricks SQL warehouse.
 * One connection and one cursor per instance; not safe to share between
 * concurrent callers.
 */

import {
  createDatabricksDriver,
  type WarehouseConnection,
  type WarehouseCursor,
  type WarehouseDriver
} from './clients/databricks-driver.js';
import { assertConnectionParams } from './connection.js';
import { errorMessage, QueryError } from './errors.js';
import { runStatement } from './helpers/execute.js';
import { DataTable } from './table.js';
import type { ConnectionParams, Logger, Row } from './types.js';

export interface ConnectionOptions {
  driver?: WarehouseDriver;
  logger?: Logger;
  /**
   * Open the session in the configured catalog/schema. Off by default:
   * both are otherwise kept on the handle for reference only.
   */
  openInNamespace?: boolean;
}

export class DatabricksConnection {
  private connection: WarehouseConnection | null = null;
  private cursor: WarehouseCursor | null = null;
  private lastColumns: string[] | null = null;
  private readonly params: ConnectionParams;
  private readonly driver: WarehouseDriver;
  private readonly logger: Logger;
  private readonly openInNamespace: boolean;

  constructor(params: ConnectionParams, options: ConnectionOptions = {}) {
    this.params = { ...params };
    this.driver = options.driver ?? createDatabricksDriver();
    this.logger = options.logger ?? console;
    this.openInNamespace = options.openInNamespace ?? false;
  }

  get hostname(): string {
    return this.params.hostname;
  }

  get catalog(): string | undefined {
    return this.params.catalog;
  }

  get schema(): string | undefined {
    return this.params.schema;
  }

  get isConnected(): boolean {
    return this.cursor !== null;
  }

  /**
   * Column names of the last executed statement, null before the first one
   */
  get description(): string[] | null {
    return this.lastColumns ? [...this.lastColumns] : null;
  }

  /**
   * Connect to the warehouse and open a cursor
   */
  async connect(): Promise<void> {
    if (this.isConnected) return;

    try {
      assertConnectionParams(this.params);

      this.connection = await this.driver.connect({
        host: this.params.hostname,
        path: this.params.httpPath,
        token: this.params.accessToken
      });
      this.cursor = await this.connection.openCursor(
        this.openInNamespace
          ? { catalog: this.params.catalog, schema: this.params.schema }
          : {}
      );
      this.logger.log('✓ Connected to Databricks');
    } catch (error) {
      this.logger.error(`✗ Failed to connect to Databricks: ${errorMessage(error)}`);
      await this.releaseAfterFailedConnect();
      throw error;
    }
  }

  /**
   * Execute a query and return every row as a tuple
   */
  async executeQuery(query: string): Promise<Row[]> {
    try {
      if (!this.cursor) {
        throw new QueryError('Not connected to Databricks');
      }
      const result = await runStatement(this.cursor, query);
      this.lastColumns = result.columns;
      return result.rows;
    } catch (error) {
      this.logger.error(`✗ Query execution failed: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Execute a query and shape the rows into a table named by the result's columns
   */
  async queryToTable(query: string): Promise<DataTable> {
    // executeQuery reports its own failures
    const rows = await this.executeQuery(query);
    try {
      const table = DataTable.fromRows(rows, this.lastColumns ?? []);
      this.logger.log(`✓ Retrieved ${table.rowCount} rows`);
      return table;
    } catch (error) {
      this.logger.error(`✗ Failed to convert results to table: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Close the cursor, then the connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    const cursor = this.cursor;
    const connection = this.connection;
    this.cursor = null;
    this.connection = null;

    try {
      try {
        if (cursor) {
          await cursor.close();
        }
      } finally {
        if (connection) {
          await connection.close();
          this.logger.log('✓ Connection closed');
        }
      }
    } catch (error) {
      this.logger.error(`✗ Failed to close Databricks connection: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async releaseAfterFailedConnect(): Promise<void> {
    const connection = this.connection;
    this.cursor = null;
    this.connection = null;
    if (!connection) return;

    try {
      await connection.close();
    } catch (closeError) {
      this.logger.error(`✗ Failed to release partial connection: ${errorMessage(closeError)}`);
    }
  }
}

#!/usr/bin/env node

/**
 * databricks-sql: run a query against a Databricks SQL warehouse from the shell
 */

import { Command, InvalidArgumentError } from 'commander';
import * as dotenv from 'dotenv';
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import type { WarehouseDriver } from './clients/databricks-driver.js';
import { describeConnectionParams, loadConnectionParams } from './connection.js';
import { errorMessage } from './errors.js';
import { pullDatabricksData } from './index.js';
import { jsonReplacer } from './table.js';
import type { Logger } from './types.js';

export interface ProgramOptions {
  env?: Record<string, string | undefined>;
  driver?: WarehouseDriver;
  logger?: Logger;
}

interface QueryCommandOptions {
  raw?: boolean;
  json?: boolean;
  head: number;
  catalog?: string;
  schema?: string;
}

export function parseRowCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export function buildProgram(options: ProgramOptions = {}): Command {
  const env = options.env ?? process.env;
  const out = options.logger ?? console;
  const program = new Command();

  program
    .name('databricks-sql')
    .description('Pull query results from a Databricks SQL warehouse')
    .version('1.0.0');

  /**
   * Query command - run SQL and print a preview of the result
   */
  program
    .command('query <sql>')
    .description('Execute a SQL query and print the results')
    .option('--raw', 'Return raw rows instead of a table')
    .option('--json', 'Print JSON instead of a text table')
    .option('-n, --head <rows>', 'Number of rows to preview', parseRowCount, 5)
    .option('--catalog <catalog>', 'Open the session in this catalog (falls back to DATABRICKS_CATALOG with --schema)')
    .option('--schema <schema>', 'Open the session in this schema (falls back to DATABRICKS_SCHEMA with --catalog)')
    .action(async (sql: string, commandOptions: QueryCommandOptions) => {
      try {
        const params = loadConnectionParams(env);
        const request = {
          ...params,
          catalog: commandOptions.catalog ?? params.catalog,
          schema: commandOptions.schema ?? params.schema,
          query: sql,
          // Only explicit flags change where unqualified names resolve
          openInNamespace: Boolean(commandOptions.catalog || commandOptions.schema),
          driver: options.driver,
          logger: out
        };

        out.log('🔄 Pulling data from Databricks...');

        if (commandOptions.raw) {
          const rows = await pullDatabricksData({ ...request, asTable: false });
          out.log(`📊 Rows returned: ${rows.length}`);
          out.log(JSON.stringify(rows, jsonReplacer, 2));
          return;
        }

        const table = await pullDatabricksData({ ...request, asTable: true });
        const preview = table.head(commandOptions.head);
        const [rowCount, columnCount] = table.shape;

        out.log('\nData preview:');
        out.log(
          commandOptions.json
            ? JSON.stringify(preview.toRecords(), jsonReplacer, 2)
            : preview.toString()
        );
        out.log(`\nShape: (${rowCount}, ${columnCount})`);
      } catch (error) {
        out.error(`❌ Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  /**
   * Config command - show current configuration
   */
  program
    .command('config')
    .description('Show current configuration')
    .action(() => {
      out.log('📋 Current Configuration\n');
      out.log('Environment Variables:');
      for (const line of describeConnectionParams(env)) {
        out.log(line);
      }
    });

  return program;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  dotenv.config();
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(`❌ ${errorMessage(error)}`);
      process.exit(1);
    });
}

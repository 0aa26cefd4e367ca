import type { WarehouseCursor } from '../clients/databricks-driver.js';
import type { QueryResult } from '../types.js';

/**
 * Execute one statement and fetch its whole result set into memory.
 * The statement handle is released whether or not the fetch succeeds.
 */
export async function runStatement(
  cursor: WarehouseCursor,
  query: string
): Promise<QueryResult> {
  const statement = await cursor.execute(query);
  try {
    const rows = await statement.fetchAll();
    const columns = await statement.columnNames();
    return { rows, columns };
  } finally {
    await statement.close();
  }
}

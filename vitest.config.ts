import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['databricks-sql-client/src/**/__tests__/**/*.test.ts'],
    environment: 'node'
  }
});

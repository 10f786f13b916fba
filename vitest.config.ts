import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Keeps config and debug lookups out of the home directory
    env: {
      DISNET_ETL_DATA_DIR: join(tmpdir(), 'disnet-etl-vitest'),
    },
  },
});

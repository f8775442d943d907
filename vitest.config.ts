import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      'notesearch-core': path.resolve(__dirname, 'notesearch-core/src/index.ts'),
    },
  },
  test: {
    include: ['notesearch-core/src/**/*.test.ts', 'notesearch-cli/src/**/*.test.ts'],
    environment: 'node',
  },
});

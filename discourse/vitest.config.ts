// Vitest configuration for the docs sync package.
// Injects DOCS_SYNC_VITEST=1 so the logger keeps test output quiet, and
// disables Sentry so no test can report an error.

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    env: {
      DOCS_SYNC_VITEST: '1',
      DOCS_SYNC_SENTRY_DISABLED: '1',
    },
  },
})

// Vitest configuration for gmail-relabel.
// Tests live beside the sources as src/**/*.test.ts.

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
  },
})

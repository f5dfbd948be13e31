import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  test: {
    coverage: {
      provider: 'v8',
      reporter: ['html', 'json', 'lcov', 'text'],
      include: ['src/**/*.{ts,tsx}'],
      exclude: [
        'src/**/*.{test,spec}.{ts,tsx}',
        'src/**/*.d.ts',
        'src/main.tsx',
        'src/test-utils/**'
      ]
    },
    environment: 'jsdom',
    globals: true,
    setupFiles: ['src/test-utils/setup.ts'],
    include: ['src/**/*.{test,spec}.{ts,tsx}'],
  }
});

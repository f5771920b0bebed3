import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/application/**',
        'src/infrastructure/db/**',
        'src/infrastructure/sync/**',
        'src/interfaces/socket/**',
      ],
    },
  },
});

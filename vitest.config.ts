import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['packages/catalogfill/__tests__/**/*.test.ts'],
        environment: 'node',
    },
});

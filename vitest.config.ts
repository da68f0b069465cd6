import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.prop.ts'],
        environment: 'node',
        testTimeout: 30000,
    },
});

import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        environment: 'node',
        globals: true,
        setupFiles: ['./src/test/setup.ts'],
        include: ['src/test/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json-summary', 'lcov', 'html'],
            include: [
                'src/api/**/*.ts',
                'src/db/priceStore.ts',
                'src/db/sqlitePriceStore.ts',
                'src/db/pgPriceStore.ts',
                'src/db/migrationFiles.ts',
                'src/middleware/**/*.ts',
                'src/services/**/*.ts',
                'src/sources/**/*.ts',
                'src/utils/**/*.ts'
            ],
            exclude: [
                'src/test/**'
            ],
            thresholds: {
                lines: 80,
                functions: 80,
                branches: 75
            }
        }
    }
})

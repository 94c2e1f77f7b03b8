import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment:             'node',
        include:                 ['tests/**/*.test.ts'],
        testTimeout:             10000,
        // winston writes through console._stderr; keep it the real stderr
        disableConsoleIntercept: true,
        // The winston stderr logger stays quiet unless a test opts in
        env:                     {
            LOG_LEVEL: 'error',
        },
    },
});

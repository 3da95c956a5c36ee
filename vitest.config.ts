import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		environment: 'node',
		include: ['{packages,engines,loggers}/*/src/**/__tests__/**/*.test.ts'],
		testTimeout: 15_000,
	},
});

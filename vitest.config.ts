import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['packages/*/src/**/*.test.ts'],
		environment: 'node',
		// Argon2 at full cost runs in pure JS; each derivation takes seconds.
		testTimeout: 120_000,
		hookTimeout: 120_000,
	},
});

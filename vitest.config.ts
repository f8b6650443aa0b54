import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
	resolve: {
		alias: {
			'@scanline/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
			'@scanline/codecs': fileURLToPath(new URL('./packages/codecs/src/index.ts', import.meta.url)),
		},
	},
	test: {
		include: ['packages/*/src/**/*.test.ts'],
		environment: 'node',
	},
})

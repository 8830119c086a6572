import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'scene',
		environment: 'node',
		include: ['src/**/*.test.ts'],
		server: {
			deps: {
				inline: ['@hierarchy/logger', '@hierarchy/search', 'zod'],
			},
		},
	},
})

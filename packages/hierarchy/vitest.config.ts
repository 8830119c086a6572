import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'hierarchy',
		environment: 'node',
		include: ['src/**/*.test.ts'],
		server: {
			deps: {
				inline: ['@hierarchy/logger'],
			},
		},
	},
})

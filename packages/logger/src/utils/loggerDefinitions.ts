export type LoggerDefinition = {
	scopes: readonly string[]
}

export const LOGGER_DEFINITIONS = {
	hierarchy: { scopes: ['hierarchy'] },
	scene: { scopes: ['scene'] },
	cli: { scopes: ['cli'] },
} as const satisfies Record<string, LoggerDefinition>

export type LoggerName = keyof typeof LOGGER_DEFINITIONS

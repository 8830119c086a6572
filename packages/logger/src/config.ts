import { LogLevels } from 'consola'
import { z } from 'zod'

export const LOG_LEVEL_ENV = 'HIERARCHY_LOG_LEVEL'

export const logLevelNameSchema = z.enum([
	'silent',
	'fatal',
	'error',
	'warn',
	'info',
	'debug',
	'trace',
	'verbose',
])

export type LogLevelName = z.infer<typeof logLevelNameSchema>

export const loggerConfigSchema = z.object({
	[LOG_LEVEL_ENV]: logLevelNameSchema.default('info'),
})

/**
 * Reads the log level from the environment. Throws a ZodError for a name
 * consola does not know.
 */
export function resolveLogLevel(
	env: Record<string, string | undefined> = process.env
): number {
	const config = loggerConfigSchema.parse({
		[LOG_LEVEL_ENV]: env[LOG_LEVEL_ENV] || undefined,
	})
	return LogLevels[config[LOG_LEVEL_ENV]]
}

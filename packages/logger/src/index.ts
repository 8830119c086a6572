import { createConsola, type ConsolaInstance } from 'consola'
import { resolveLogLevel } from './config'
import { LOGGER_DEFINITIONS, type LoggerName } from './utils/loggerDefinitions'
import { buildTag } from './utils/tags'

export type Loggers = Record<LoggerName, ConsolaInstance>

export function createLoggers(
	base: ConsolaInstance = createConsola({ level: resolveLogLevel() })
): Loggers {
	return {
		hierarchy: base.withTag(buildTag(LOGGER_DEFINITIONS.hierarchy.scopes)),
		scene: base.withTag(buildTag(LOGGER_DEFINITIONS.scene.scopes)),
		cli: base.withTag(buildTag(LOGGER_DEFINITIONS.cli.scopes)),
	}
}

export const loggers: Loggers = createLoggers()

export {
	LOG_LEVEL_ENV,
	loggerConfigSchema,
	logLevelNameSchema,
	resolveLogLevel,
	type LogLevelName,
} from './config'
export {
	LOGGER_DEFINITIONS,
	type LoggerDefinition,
	type LoggerName,
} from './utils/loggerDefinitions'
export { buildTag, TAG_SEPARATOR } from './utils/tags'
export type { ConsolaInstance } from 'consola'

import { createConsola, type LogObject } from 'consola'
import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import { LOG_LEVEL_ENV, resolveLogLevel } from './config'
import { createLoggers } from './index'
import { buildTag } from './utils/tags'

describe('resolveLogLevel', () => {
	it('defaults to info when the variable is unset or empty', () => {
		expect(resolveLogLevel({})).toBe(3)
		expect(resolveLogLevel({ [LOG_LEVEL_ENV]: '' })).toBe(3)
	})

	it('maps level names to consola levels', () => {
		expect(resolveLogLevel({ [LOG_LEVEL_ENV]: 'warn' })).toBe(1)
		expect(resolveLogLevel({ [LOG_LEVEL_ENV]: 'debug' })).toBe(4)
		expect(resolveLogLevel({ [LOG_LEVEL_ENV]: 'trace' })).toBe(5)
	})

	it('rejects unknown level names', () => {
		expect(() => resolveLogLevel({ [LOG_LEVEL_ENV]: 'loud' })).toThrow(
			ZodError
		)
	})
})

describe('buildTag', () => {
	it('joins scopes and skips empty ones', () => {
		expect(buildTag(['scene', '', 'inspect'])).toBe('scene:inspect')
		expect(buildTag([])).toBe('')
	})
})

describe('createLoggers', () => {
	const capture = () => {
		const logs: LogObject[] = []
		const base = createConsola({
			level: 5,
			reporters: [{ log: (logObj) => logs.push(logObj) }],
		})
		return { logs, loggers: createLoggers(base) }
	}

	it('tags each logger with its scope', () => {
		const { logs, loggers } = capture()
		loggers.hierarchy.info('hello')
		loggers.cli.warn('careful')

		expect(logs.map((entry) => [entry.tag, entry.type])).toEqual([
			['hierarchy', 'info'],
			['cli', 'warn'],
		])
		expect(logs[0]?.args).toEqual(['hello'])
	})

	it('nests sub-tags with withTag', () => {
		const { logs, loggers } = capture()
		loggers.scene.withTag('inspect').debug('nested')

		expect(logs).toHaveLength(1)
		expect(logs[0]?.tag).toBe('scene:inspect')
	})
})

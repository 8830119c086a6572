import { describe, expect, it } from 'vitest'
import { resolvePath } from '@hierarchy/search'
import { ZodError } from 'zod'
import shapes from '../fixtures/shapes.json'
import { UnknownTagError } from './errors'
import { loadScene, parseSceneFile } from './schema'

describe('parseSceneFile', () => {
	it('defaults the tag list', () => {
		expect(parseSceneFile({ root: { name: 'Scene' } })).toEqual({
			tags: [],
			root: { name: 'Scene' },
		})
	})

	it('rejects nodes without a name', () => {
		expect(() =>
			parseSceneFile({ root: { name: 'Scene', children: [{ active: true }] } })
		).toThrow(ZodError)
	})

	it('rejects empty tag names', () => {
		expect(() => parseSceneFile({ tags: [''], root: { name: 'Scene' } })).toThrow(
			ZodError
		)
	})
})

describe('loadScene', () => {
	it('builds the node tree in document order', () => {
		const { root, registry } = loadScene(shapes)
		const controller = resolvePath(root, '/Scene/ParentOfShapes/Circles/Controller')

		expect(registry.tags()).toEqual(['Untagged', 'Circle', 'Square'])
		expect(controller?.children().map((child) => child.name())).toEqual([
			'Group',
			'Square5',
			'Row',
		])
		expect(controller?.children()[1]?.isActive()).toBe(false)
		expect(resolvePath(root, 'ParentOfShapes/Circles')?.hasTag('Circle')).toBe(
			true
		)
	})

	it('defaults nodes to active', () => {
		const { root } = loadScene({ root: { name: 'Scene', children: [{ name: 'a' }] } })
		expect(root.children()[0]?.isActive()).toBe(true)
	})

	it('throws for tags missing from the registry', () => {
		expect(() =>
			loadScene({ tags: ['Circle'], root: { name: 'Scene', tags: ['Square'] } })
		).toThrow(UnknownTagError)
	})
})

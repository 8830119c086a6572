import { loggers } from '@hierarchy/logger'
import { findDescendants } from '@hierarchy/search'
import { z } from 'zod'
import { SceneNode } from './sceneNode'
import { TagRegistry } from './tagRegistry'

const log = loggers.scene.withTag('load')

export type SceneNodeDescription = {
	name: string
	active?: boolean
	tags?: string[]
	children?: SceneNodeDescription[]
}

/**
 * Schema for one scene object and its subtree (recursive).
 */
export const sceneNodeSchema: z.ZodType<SceneNodeDescription> = z.lazy(() =>
	z.object({
		name: z.string().min(1),
		active: z.boolean().optional(),
		tags: z.array(z.string().min(1)).optional(),
		children: z.array(sceneNodeSchema).optional(),
	})
)

export const sceneFileSchema = z.object({
	tags: z.array(z.string().min(1)).default([]),
	root: sceneNodeSchema,
})

export type SceneFile = z.infer<typeof sceneFileSchema>

export type LoadedScene = {
	registry: TagRegistry
	root: SceneNode
}

/**
 * Validates a scene JSON document. Throws if invalid.
 */
export function parseSceneFile(json: unknown): SceneFile {
	return sceneFileSchema.parse(json)
}

/**
 * Builds a scene from JSON. Tags listed at the top level are registered
 * before any node is created, so a node using an unlisted tag throws
 * UnknownTagError.
 */
export function loadScene(json: unknown): LoadedScene {
	const file = parseSceneFile(json)
	const registry = new TagRegistry(file.tags)

	const build = (
		description: SceneNodeDescription,
		parent?: SceneNode
	): SceneNode => {
		const node = new SceneNode(description.name, {
			registry,
			active: description.active ?? true,
			tags: description.tags,
			parent,
		})
		for (const child of description.children ?? []) {
			build(child, node)
		}
		return node
	}

	const root = build(file.root)
	const count = findDescendants(root, () => true).length + 1
	log.debug(`loaded "${root.name()}" with ${count} nodes`)

	return { registry, root }
}

import type { HierarchyNode } from '@hierarchy/search'
import { SceneCycleError } from './errors'
import type { TagRegistry } from './tagRegistry'

export interface SceneNodeOptions {
	registry: TagRegistry
	/** Own activation flag (default: true) */
	active?: boolean
	tags?: Iterable<string>
	parent?: SceneNode
}

/**
 * In-memory scene object. Owns its children list and keeps parent links
 * consistent on every reparent.
 */
export class SceneNode implements HierarchyNode<SceneNode> {
	readonly registry: TagRegistry
	private label: string
	private activeSelf: boolean
	private readonly tagSet = new Set<string>()
	private readonly childList: SceneNode[] = []
	private parentNode: SceneNode | undefined

	constructor(name: string, options: SceneNodeOptions) {
		this.label = name
		this.registry = options.registry
		this.activeSelf = options.active ?? true
		for (const tag of options.tags ?? []) {
			this.addTag(tag)
		}
		if (options.parent) {
			this.setParent(options.parent)
		}
	}

	children(): readonly SceneNode[] {
		return this.childList
	}

	parent(): SceneNode | undefined {
		return this.parentNode
	}

	name(): string {
		return this.label
	}

	rename(name: string): void {
		this.label = name
	}

	/**
	 * Own flag only; an active node under an inactive parent still reports
	 * true.
	 */
	isActive(): boolean {
		return this.activeSelf
	}

	setActive(active: boolean): void {
		this.activeSelf = active
	}

	hasTag(tag: string): boolean {
		this.registry.assertKnown(tag)
		return this.tagSet.has(tag)
	}

	addTag(tag: string): void {
		this.registry.assertKnown(tag)
		this.tagSet.add(tag)
	}

	removeTag(tag: string): boolean {
		this.registry.assertKnown(tag)
		return this.tagSet.delete(tag)
	}

	tags(): string[] {
		return [...this.tagSet]
	}

	/**
	 * Move under `parent` at `index` (clamped; default: last), or make this
	 * node a root when `parent` is undefined.
	 */
	setParent(parent: SceneNode | undefined, index?: number): void {
		if (parent && (parent === this || parent.isDescendantOf(this))) {
			throw new SceneCycleError(this.label, parent.label)
		}

		if (this.parentNode) {
			const siblings = this.parentNode.childList
			const position = siblings.indexOf(this)
			if (position !== -1) siblings.splice(position, 1)
		}

		this.parentNode = parent
		if (!parent) return

		const count = parent.childList.length
		const at = index === undefined ? count : Math.min(Math.max(index, 0), count)
		parent.childList.splice(at, 0, this)
	}

	addChild(child: SceneNode, index?: number): this {
		child.setParent(this, index)
		return this
	}

	detach(): void {
		this.setParent(undefined)
	}

	private isDescendantOf(node: SceneNode): boolean {
		for (let current = this.parentNode; current; current = current.parentNode) {
			if (current === node) return true
		}
		return false
	}
}

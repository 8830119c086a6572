import { PATH_SEPARATOR } from './constants'
import type { HierarchyNode } from './types'

/**
 * Full path of a node, root-most name first, each name preceded by the
 * separator. Only valid until the host reparents or renames something.
 *
 * @example
 * pathOf(d) // => "/A/B/D"
 * pathOf(d, '.') // => ".A.B.D"
 */
export function pathOf<TNode extends HierarchyNode<TNode>>(
	node: TNode,
	separator: string = PATH_SEPARATOR
): string {
	const names = [node.name()]
	for (
		let current: TNode | undefined = node.parent();
		current;
		current = current.parent()
	) {
		names.push(current.name())
	}
	return separator + names.reverse().join(separator)
}

/**
 * Resolve a path produced by {@link pathOf} back to a node.
 *
 * An absolute path ("/A/B/D") starts with `root`'s own name; a relative one
 * ("B/D") starts at `root`'s children. Each segment takes the first child
 * with that name, so names containing the separator cannot be reached.
 *
 * @example
 * resolvePath(a, '/A/B/D') // => D
 * resolvePath(a, 'B/D')    // => D
 * resolvePath(a, '')       // => a
 */
export function resolvePath<TNode extends HierarchyNode<TNode>>(
	root: TNode,
	path: string,
	separator: string = PATH_SEPARATOR
): TNode | undefined {
	let segments = path.split(separator).filter(Boolean)

	if (path.startsWith(separator)) {
		const [rootName, ...rest] = segments
		if (rootName !== root.name()) return undefined
		segments = rest
	}

	let current = root
	for (const segment of segments) {
		const next = current.children().find((child) => child.name() === segment)
		if (!next) return undefined
		current = next
	}
	return current
}

import { loggers } from '@hierarchy/logger'
import { DEFAULT_SEARCH_OPTIONS } from './constants'
import type {
	AncestorSearchOptions,
	DescendantSearchOptions,
	DescendantsSearchOptions,
	HierarchyNode,
	NodePredicate,
} from './types'

const log = loggers.hierarchy.withTag('search')

const qualifier = <TNode extends HierarchyNode<TNode>>(
	predicate: NodePredicate<TNode>,
	mustBeActive: boolean
): NodePredicate<TNode> =>
	mustBeActive
		? (node) => predicate(node) && node.isActive()
		: predicate

function searchDepthFirst<TNode extends HierarchyNode<TNode>>(
	node: TNode,
	matches: NodePredicate<TNode>
): TNode | undefined {
	for (const child of node.children()) {
		if (matches(child)) return child
		const found = searchDepthFirst(child, matches)
		if (found) return found
	}
	return undefined
}

function searchBreadthFirst<TNode extends HierarchyNode<TNode>>(
	root: TNode,
	matches: NodePredicate<TNode>
): TNode | undefined {
	let level: readonly TNode[] = root.children()
	while (level.length > 0) {
		const next: TNode[] = []
		for (const node of level) {
			if (matches(node)) return node
			for (const child of node.children()) {
				next.push(child)
			}
		}
		level = next
	}
	return undefined
}

/**
 * Find the first node below `root` that satisfies `predicate`.
 *
 * Depth-first returns the first match in pre-order: a node before its
 * descendants, an earlier sibling's whole subtree before the next sibling.
 * Breadth-first returns a shallowest match, the earliest in level order.
 * Inactive nodes are still descended into when `mustBeActive` is set.
 *
 * @example
 * findDescendant(scene, byName('Square5'), { order: 'breadth-first' })
 */
export function findDescendant<TNode extends HierarchyNode<TNode>>(
	root: TNode,
	predicate: NodePredicate<TNode>,
	options: DescendantSearchOptions = {}
): TNode | undefined {
	const {
		mustBeActive = DEFAULT_SEARCH_OPTIONS.mustBeActive,
		order = DEFAULT_SEARCH_OPTIONS.order,
	} = options
	const matches = qualifier(predicate, mustBeActive)

	const found =
		order === 'breadth-first'
			? searchBreadthFirst(root, matches)
			: searchDepthFirst(root, matches)

	log.trace(`${order} search below "${root.name()}": ${found ? 'hit' : 'miss'}`)
	return found
}

/**
 * Collect every node below `root` that satisfies `predicate`, in pre-order.
 * Returns an empty array when nothing matches.
 */
export function findDescendants<TNode extends HierarchyNode<TNode>>(
	root: TNode,
	predicate: NodePredicate<TNode>,
	options: DescendantsSearchOptions = {}
): TNode[] {
	const { mustBeActive = DEFAULT_SEARCH_OPTIONS.mustBeActive } = options
	const matches = qualifier(predicate, mustBeActive)
	const found: TNode[] = []

	const visit = (node: TNode) => {
		for (const child of node.children()) {
			if (matches(child)) found.push(child)
			visit(child)
		}
	}
	visit(root)

	log.trace(`collected ${found.length} below "${root.name()}"`)
	return found
}

/**
 * Walk up from `node` (excluded) and return the nearest ancestor that
 * satisfies `predicate`. Ancestors are unfiltered by activity unless
 * `mustBeActive` is passed.
 */
export function findAncestor<TNode extends HierarchyNode<TNode>>(
	node: TNode,
	predicate: NodePredicate<TNode>,
	options: AncestorSearchOptions = {}
): TNode | undefined {
	const { mustBeActive = DEFAULT_SEARCH_OPTIONS.mustBeActive } = options
	const matches = qualifier(predicate, mustBeActive)

	for (
		let current: TNode | undefined = node.parent();
		current;
		current = current.parent()
	) {
		if (matches(current)) return current
	}
	return undefined
}

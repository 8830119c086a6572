import { findAncestor, findDescendant, findDescendants } from './search'
import type {
	AncestorSearchOptions,
	DescendantSearchOptions,
	DescendantsSearchOptions,
	HierarchyNode,
	NodePredicate,
} from './types'

export const byName =
	(name: string): NodePredicate<{ name(): string }> =>
	(node) =>
		node.name() === name

/**
 * Tag-membership predicate. Unknown tags surface the host's error on the
 * first node tested.
 */
export const byTag =
	(tag: string): NodePredicate<{ hasTag(tag: string): boolean }> =>
	(node) =>
		node.hasTag(tag)

export const findDescendantByName = <TNode extends HierarchyNode<TNode>>(
	root: TNode,
	name: string,
	options?: DescendantSearchOptions
): TNode | undefined => findDescendant(root, byName(name), options)

export const findDescendantByTag = <TNode extends HierarchyNode<TNode>>(
	root: TNode,
	tag: string,
	options?: DescendantSearchOptions
): TNode | undefined => findDescendant(root, byTag(tag), options)

export const findDescendantsByName = <TNode extends HierarchyNode<TNode>>(
	root: TNode,
	name: string,
	options?: DescendantsSearchOptions
): TNode[] => findDescendants(root, byName(name), options)

export const findDescendantsByTag = <TNode extends HierarchyNode<TNode>>(
	root: TNode,
	tag: string,
	options?: DescendantsSearchOptions
): TNode[] => findDescendants(root, byTag(tag), options)

export const findAncestorByName = <TNode extends HierarchyNode<TNode>>(
	node: TNode,
	name: string,
	options?: AncestorSearchOptions
): TNode | undefined => findAncestor(node, byName(name), options)

export const findAncestorByTag = <TNode extends HierarchyNode<TNode>>(
	node: TNode,
	tag: string,
	options?: AncestorSearchOptions
): TNode | undefined => findAncestor(node, byTag(tag), options)

/**
 * Read-only view of one vertex in a host-owned tree.
 *
 * The host owns creation, reparenting and activation. Searches only read
 * through this interface and never hold on to a node past a single call.
 * The type parameter is the host's own node type, so results come back as
 * that type rather than as the bare capability.
 */
export interface HierarchyNode<TNode extends HierarchyNode<TNode>> {
	/** Ordered children, stable for the duration of one search */
	children(): readonly TNode[]
	/** Undefined at the root */
	parent(): TNode | undefined
	name(): string
	isActive(): boolean
	/**
	 * Tag membership. Hosts may throw for a tag missing from their registry;
	 * searches let that error through.
	 */
	hasTag(tag: string): boolean
}

export type NodePredicate<TNode> = (node: TNode) => boolean

export type TraversalOrder = 'depth-first' | 'breadth-first'

export interface ActivityFilter {
	/** Only return nodes whose isActive() is true (default: false) */
	mustBeActive?: boolean
}

export interface DescendantSearchOptions extends ActivityFilter {
	/** Which match wins when several exist (default: 'depth-first') */
	order?: TraversalOrder
}

export type DescendantsSearchOptions = ActivityFilter

export type AncestorSearchOptions = ActivityFilter

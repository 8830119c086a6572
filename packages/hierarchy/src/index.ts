export type {
	ActivityFilter,
	AncestorSearchOptions,
	DescendantSearchOptions,
	DescendantsSearchOptions,
	HierarchyNode,
	NodePredicate,
	TraversalOrder,
} from './types'

export { DEFAULT_SEARCH_OPTIONS, PATH_SEPARATOR } from './constants'

export { findAncestor, findDescendant, findDescendants } from './search'

export { pathOf, resolvePath } from './path'

export {
	byName,
	byTag,
	findAncestorByName,
	findAncestorByTag,
	findDescendantByName,
	findDescendantByTag,
	findDescendantsByName,
	findDescendantsByTag,
} from './predicates'

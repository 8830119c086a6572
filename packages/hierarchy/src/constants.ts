import type { TraversalOrder } from './types'

export const PATH_SEPARATOR = '/'

export const DEFAULT_SEARCH_OPTIONS: {
	readonly mustBeActive: boolean
	readonly order: TraversalOrder
} = {
	mustBeActive: false,
	order: 'depth-first',
}

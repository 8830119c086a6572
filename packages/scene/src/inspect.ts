import { loggers } from '@hierarchy/logger'
import {
	findAncestorByName,
	findAncestorByTag,
	findDescendantByName,
	findDescendantByTag,
	findDescendantsByTag,
	pathOf,
	type HierarchyNode,
} from '@hierarchy/search'
import { z } from 'zod'

const log = loggers.scene.withTag('inspect')

export const inspectQuerySchema = z.object({
	ancestorName: z.string().min(1).optional(),
	ancestorTag: z.string().min(1).optional(),
	descendantName: z.string().min(1).optional(),
	descendantTag: z.string().min(1).optional(),
	collectTag: z.string().min(1).optional(),
})

export type InspectQuery = z.infer<typeof inspectQuerySchema>

export type InspectEntry = {
	label: string
	path: string
}

/**
 * Runs the usual lookups around `node` and reports the path of each hit.
 * Descendant lookups only consider active nodes; misses are left out.
 *
 * @example
 * inspectNode(shapes, { descendantName: 'Square5' })
 * // => [{ label: "child named 'Square5' depth first", path: '/Scene/Shapes/Square5' }, ...]
 */
export function inspectNode<TNode extends HierarchyNode<TNode>>(
	node: TNode,
	query: InspectQuery
): InspectEntry[] {
	const entries: InspectEntry[] = []
	const report = (label: string, found: TNode | undefined) => {
		if (!found) return
		const entry = { label, path: pathOf(found) }
		log.info(`Found ${entry.label}: ${entry.path}`)
		entries.push(entry)
	}

	const {
		ancestorName,
		ancestorTag,
		descendantName,
		descendantTag,
		collectTag,
	} = query

	if (ancestorName) {
		report(
			`parent named '${ancestorName}'`,
			findAncestorByName(node, ancestorName)
		)
	}
	if (ancestorTag) {
		report(
			`parent with tag '${ancestorTag}'`,
			findAncestorByTag(node, ancestorTag)
		)
	}
	if (descendantName) {
		report(
			`child named '${descendantName}' depth first`,
			findDescendantByName(node, descendantName, { mustBeActive: true })
		)
		report(
			`child named '${descendantName}' breadth first`,
			findDescendantByName(node, descendantName, {
				mustBeActive: true,
				order: 'breadth-first',
			})
		)
	}
	if (descendantTag) {
		report(
			`child with tag '${descendantTag}' depth first`,
			findDescendantByTag(node, descendantTag, { mustBeActive: true })
		)
		report(
			`child with tag '${descendantTag}' breadth first`,
			findDescendantByTag(node, descendantTag, {
				mustBeActive: true,
				order: 'breadth-first',
			})
		)
	}
	if (collectTag) {
		for (const match of findDescendantsByTag(node, collectTag, {
			mustBeActive: true,
		})) {
			report(`active child with tag '${collectTag}'`, match)
		}
	}

	return entries
}

import { loggers } from '@hierarchy/logger'
import { UnknownTagError } from './errors'

const log = loggers.scene.withTag('tags')

export const UNTAGGED = 'Untagged'

/**
 * The set of tags a scene may use. Asking a node about any other tag is a
 * host error.
 */
export class TagRegistry {
	private readonly known = new Set<string>([UNTAGGED])

	constructor(tags: Iterable<string> = []) {
		for (const tag of tags) {
			this.register(tag)
		}
	}

	register(tag: string): this {
		if (!this.known.has(tag)) {
			this.known.add(tag)
			log.debug(`registered "${tag}"`)
		}
		return this
	}

	has(tag: string): boolean {
		return this.known.has(tag)
	}

	assertKnown(tag: string): void {
		if (!this.known.has(tag)) {
			throw new UnknownTagError(tag)
		}
	}

	tags(): string[] {
		return [...this.known]
	}
}

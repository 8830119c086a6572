export class UnknownTagError extends Error {
	readonly tag: string

	constructor(tag: string) {
		super(`Tag: ${tag} is not defined.`)
		this.name = 'UnknownTagError'
		this.tag = tag
	}
}

export class SceneCycleError extends Error {
	constructor(child: string, parent: string) {
		super(`Cannot parent "${child}" under its own descendant "${parent}".`)
		this.name = 'SceneCycleError'
	}
}

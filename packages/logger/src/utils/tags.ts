export const TAG_SEPARATOR = ':'

export const buildTag = (scopes: readonly string[]): string =>
	scopes.filter(Boolean).join(TAG_SEPARATOR)

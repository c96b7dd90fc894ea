import type { Session } from '../protocol/types.js'

/** Aliases the claude CLI resolves itself to the latest model of each family */
export const MODEL_ALIASES = ['sonnet', 'opus', 'haiku'] as const

/**
 * Known aliases are matched case-insensitively; anything else (a full model
 * id) is passed through untouched.
 */
export const normalizeModelName = (model: string): string => {
	const trimmed = model.trim()
	const lower = trimmed.toLowerCase()
	const alias = MODEL_ALIASES.find((name) => name === lower)
	return alias ?? trimmed
}

/** Model the next exchange will use, for display */
export const effectiveModel = (session: Pick<Session, 'model'> | undefined, defaultModel?: string): string =>
	session?.model || defaultModel || 'default'

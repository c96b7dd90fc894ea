import type { ClaudeResult } from '../protocol/types.js'

/** Telegram's maximum message length */
export const MAX_TELEGRAM_MESSAGE_LENGTH = 4096

export const EMPTY_REPLY_PLACEHOLDER = '(empty response from Claude)'

const stringify = (value: unknown): string => {
	if (typeof value === 'string') return value
	if (value === undefined) return ''
	if (typeof value === 'object' && value !== null) return JSON.stringify(value)
	return String(value)
}

/** Error text of a tagged failure, or undefined for a normal result. */
export const resultError = (result: ClaudeResult): string | undefined =>
	'error' in result ? stringify(result.error) : undefined

export const resultCost = (result: ClaudeResult): number | undefined =>
	typeof result.cost_usd === 'number' && Number.isFinite(result.cost_usd) ? result.cost_usd : undefined

/**
 * Reply text of a result. `result` may be a string or a list of content
 * segments; only text segments and bare strings are kept.
 */
export const extractResponseText = (result: ClaudeResult): string => {
	const error = resultError(result)
	if (error !== undefined) return `Error: ${error}`

	const body = 'result' in result ? result.result : ''
	if (typeof body === 'string') return body

	if (Array.isArray(body)) {
		const parts: string[] = []
		for (const segment of body) {
			if (typeof segment === 'string') {
				parts.push(segment)
			} else if (typeof segment === 'object' && segment !== null && 'type' in segment && segment.type === 'text') {
				const text = 'text' in segment ? segment.text : ''
				parts.push(typeof text === 'string' ? text : stringify(text))
			}
		}
		return parts.join('\n')
	}

	return stringify(body)
}

export const formatCost = (result: ClaudeResult): string => {
	const cost = resultCost(result)
	return cost === undefined ? '' : `\n[cost: $${cost.toFixed(4)}]`
}

const findCut = (text: string, limit: number): number => {
	// A separator is only usable if the piece before it is non-empty
	for (const separator of ['\n\n', '\n', ' ']) {
		// The whole separator has to sit inside the limit
		const cut = text.lastIndexOf(separator, limit - separator.length)
		if (cut > 0) return cut
	}
	return limit
}

/**
 * Split text into pieces of at most `limit` characters, cutting at the last
 * paragraph break, then line break, then space, then hard at `limit`.
 * Leading newlines of the remainder are dropped after each cut.
 */
export const chunkMessage = (text: string, limit = MAX_TELEGRAM_MESSAGE_LENGTH): string[] => {
	if (text.length <= limit) return [text]

	const chunks: string[] = []
	let remaining = text

	while (remaining) {
		if (remaining.length <= limit) {
			chunks.push(remaining)
			break
		}

		const cut = findCut(remaining, limit)
		chunks.push(remaining.slice(0, cut))
		remaining = remaining.slice(cut).replace(/^\n+/, '')
	}

	return chunks
}

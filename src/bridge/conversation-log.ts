import { appendFile, mkdir, readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { ChatUser, ClaudeResult, ConversationLogEntry, Session } from '../protocol/types.js'
import { effectiveModel } from './models.js'
import { resultCost, resultError } from './response.js'

const PREVIEW_LENGTH = 200

export type AppendConversationLogOptions = {
	logsDir: string
	user: ChatUser
	session: Session
	prompt: string
	result: ClaudeResult
	replyText: string
	defaultModel?: string
	now?: Date
}

/** YYYY-MM-DD in UTC */
export const logFileDate = (date: Date): string => date.toISOString().split('T')[0]

export const buildConversationLogEntry = (options: AppendConversationLogOptions): ConversationLogEntry => {
	const { user, session, prompt, result, replyText, defaultModel } = options
	const now = options.now ?? new Date()
	return {
		timestamp: now.toISOString(),
		user_id: user.id,
		username: user.username ?? null,
		session_id: session.session_id,
		model: effectiveModel(session, defaultModel),
		prompt,
		response_preview: replyText.slice(0, PREVIEW_LENGTH),
		cost_usd: resultCost(result) ?? null,
		error: resultError(result) ?? null,
	}
}

/**
 * Appends one JSON line to today's file. The full transcript lives with the
 * claude CLI under the same session id; this is only the index.
 */
export const appendConversationLog = async (options: AppendConversationLogOptions): Promise<ConversationLogEntry> => {
	const entry = buildConversationLogEntry(options)
	await mkdir(options.logsDir, { recursive: true })
	const logPath = join(options.logsDir, `${logFileDate(new Date(entry.timestamp))}.jsonl`)
	await appendFile(logPath, `${JSON.stringify(entry)}\n`, 'utf-8')
	return entry
}

const isLogEntry = (value: unknown): value is ConversationLogEntry => {
	if (typeof value !== 'object' || value === null) return false
	return (
		'timestamp' in value && typeof value.timestamp === 'string' &&
		'user_id' in value && typeof value.user_id === 'number' &&
		'session_id' in value && typeof value.session_id === 'string' &&
		'prompt' in value && typeof value.prompt === 'string'
	)
}

export type ReadConversationLogsOptions = {
	logsDir: string
	userId: number
	count: number
}

/** Newest first, across daily files, for one user. */
export const readRecentConversationLogs = async (
	options: ReadConversationLogsOptions
): Promise<ConversationLogEntry[]> => {
	const { logsDir, userId, count } = options
	if (count <= 0) return []

	let files: string[]
	try {
		files = await readdir(logsDir)
	} catch {
		return []
	}

	const entries: ConversationLogEntry[] = []
	const dailyFiles = files.filter((name) => name.endsWith('.jsonl')).sort().reverse()
	for (const name of dailyFiles) {
		const lines = (await readFile(join(logsDir, name), 'utf-8')).split('\n').reverse()
		for (const line of lines) {
			if (!line.trim()) continue
			let parsed: unknown
			try {
				parsed = JSON.parse(line)
			} catch {
				continue
			}
			if (!isLogEntry(parsed) || parsed.user_id !== userId) continue
			entries.push(parsed)
			if (entries.length >= count) return entries
		}
	}
	return entries
}

export const formatConversationLogs = (entries: ConversationLogEntry[]): string =>
	entries
		.map((entry) => {
			const ts = entry.timestamp.slice(0, 19).replace('T', ' ')
			const cost = typeof entry.cost_usd === 'number' && entry.cost_usd ? ` [$${entry.cost_usd.toFixed(4)}]` : ''
			const preview = (entry.response_preview ?? '').slice(0, 80)
			return `${ts} | ${entry.session_id.slice(0, 8)}...\n> ${entry.prompt.slice(0, 80)}\n${preview}${cost}\n`
		})
		.join('\n')

import { randomUUID } from 'node:crypto'
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Session, SessionMap } from '../protocol/types.js'
import { errorMessage, logEvent } from '../logging/file.js'

export type SessionStoreOptions = {
	path: string
	/** Model given to sessions created from scratch */
	defaultModel?: string
	generateId?: () => string
}

export type SessionStore = {
	get: (userId: number | string) => Session | undefined
	ensure: (userId: number | string) => Promise<Session>
	reset: (userId: number | string) => Promise<Session>
	setModel: (userId: number | string, model: string) => Promise<Session>
	/**
	 * Counts one exchange. With `sessionId`, does nothing when that session has
	 * since been replaced (a `/reset` landed while claude was running).
	 */
	increment: (userId: number | string, sessionId?: string) => Promise<Session>
	size: () => number
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value)

const toSession = (value: unknown): Session | undefined => {
	if (!isRecord(value) || typeof value.session_id !== 'string') return undefined
	const count = value.message_count
	return {
		session_id: value.session_id,
		model: typeof value.model === 'string' ? value.model : null,
		message_count: typeof count === 'number' && Number.isInteger(count) && count >= 0 ? count : 0,
	}
}

/**
 * Missing file is an empty map. An unreadable or unparsable file is logged
 * and also treated as empty.
 */
export const loadSessionMap = async (path: string): Promise<SessionMap> => {
	let raw: string
	try {
		raw = await readFile(path, 'utf-8')
	} catch (err) {
		if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {}
		void logEvent('warn', 'Unreadable sessions file, starting fresh', { path, error: errorMessage(err) })
		return {}
	}

	let parsed: unknown
	try {
		parsed = JSON.parse(raw)
	} catch (err) {
		void logEvent('warn', 'Corrupt sessions file, starting fresh', { path, error: errorMessage(err) })
		return {}
	}
	if (!isRecord(parsed)) {
		void logEvent('warn', 'Corrupt sessions file, starting fresh', { path, error: 'not a JSON object' })
		return {}
	}

	const sessions: SessionMap = {}
	for (const [key, value] of Object.entries(parsed)) {
		const session = toSession(value)
		if (session) sessions[key] = session
	}
	return sessions
}

/** Full rewrite through a temp file and rename. */
export const saveSessionMap = async (path: string, sessions: SessionMap): Promise<void> => {
	await mkdir(dirname(path), { recursive: true })
	const tmpPath = `${path}.${process.pid}.tmp`
	await writeFile(tmpPath, JSON.stringify(sessions, null, 2), 'utf-8')
	await rename(tmpPath, path)
}

export const createSessionStore = async (options: SessionStoreOptions): Promise<SessionStore> => {
	const sessions = new Map(Object.entries(await loadSessionMap(options.path)))
	const generateId = options.generateId ?? randomUUID
	const defaultModel = options.defaultModel ?? null

	// Every mutation and its write run one at a time, in call order
	let tail: Promise<unknown> = Promise.resolve()
	const serialize = <T>(task: () => Promise<T>): Promise<T> => {
		const run = tail.then(task)
		tail = run.catch(() => undefined)
		return run
	}

	const persist = () => saveSessionMap(options.path, Object.fromEntries(sessions))

	const fresh = (model: string | null): Session => ({
		session_id: generateId(),
		model,
		message_count: 0,
	})

	const ensureInMemory = (key: string): { session: Session; created: boolean } => {
		const existing = sessions.get(key)
		if (existing) return { session: existing, created: false }
		const session = fresh(defaultModel)
		sessions.set(key, session)
		return { session, created: true }
	}

	return {
		get: (userId) => {
			const session = sessions.get(String(userId))
			return session ? { ...session } : undefined
		},

		ensure: (userId) =>
			serialize(async () => {
				const { session, created } = ensureInMemory(String(userId))
				if (created) await persist()
				return { ...session }
			}),

		reset: (userId) =>
			serialize(async () => {
				const key = String(userId)
				const previous = sessions.get(key)
				const session = fresh(previous ? previous.model : defaultModel)
				sessions.set(key, session)
				await persist()
				return { ...session }
			}),

		setModel: (userId, model) =>
			serialize(async () => {
				const { session } = ensureInMemory(String(userId))
				session.model = model
				await persist()
				return { ...session }
			}),

		increment: (userId, sessionId) =>
			serialize(async () => {
				const { session, created } = ensureInMemory(String(userId))
				if (sessionId !== undefined && session.session_id !== sessionId) {
					if (created) await persist()
					return { ...session }
				}
				session.message_count += 1
				await persist()
				return { ...session }
			}),

		size: () => sessions.size,
	}
}

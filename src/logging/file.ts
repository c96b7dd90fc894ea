import { appendFile, mkdir } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'

type LogLevel = 'info' | 'warn' | 'error'

let logDir = join(homedir(), '.config', 'tg-claude-bridge')
let logFile = join(logDir, 'bridge.log')
let initialized = false

export const setLogDir = (dir: string) => {
	logDir = dir
	logFile = join(dir, 'bridge.log')
	initialized = false
}

const ensureLogDir = async () => {
	if (initialized) return
	await mkdir(logDir, { recursive: true })
	initialized = true
}

export const logToFile = async (
	level: LogLevel,
	message: string,
	context?: Record<string, unknown>
) => {
	try {
		await ensureLogDir()
		const entry = {
			ts: new Date().toISOString(),
			level,
			message,
			...context,
		}
		await appendFile(logFile, `${JSON.stringify(entry)}\n`, 'utf8')
	} catch {
		console.error('[logging] Failed to write log entry')
	}
}

/** Timestamp prefix for console logs (HH:MM:SS.mmm) */
const ts = (): string => {
	const now = new Date()
	return now.toISOString().slice(11, 23)
}

/** Timestamped console.log */
export const log = (...args: unknown[]): void => {
	console.log(ts(), ...args)
}

/** Timestamped console.error */
export const logError = (...args: unknown[]): void => {
	console.error(ts(), ...args)
}

/** Timestamped console.warn */
export const logWarn = (...args: unknown[]): void => {
	console.warn(ts(), ...args)
}

const consoleFor: Record<LogLevel, (...args: unknown[]) => void> = {
	info: log,
	warn: logWarn,
	error: logError,
}

/**
 * Console line plus a JSON entry in bridge.log. Never throws, so callers can
 * fire and forget.
 */
export const logEvent = (
	level: LogLevel,
	message: string,
	context?: Record<string, unknown>
): Promise<void> => {
	const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : ''
	consoleFor[level](`${message}${suffix}`)
	return logToFile(level, message, context)
}

export const errorMessage = (err: unknown): string =>
	err instanceof Error ? err.message : 'unknown error'

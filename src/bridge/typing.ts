import { setTimeout as sleep } from 'node:timers/promises'
import { errorMessage, logToFile } from '../logging/file.js'

/** Telegram shows "typing" for about five seconds per chat action */
export const TYPING_INTERVAL_MS = 4000

export type TypingLoop = {
	/** Cancels the loop (also mid-sleep) and waits for it to finish */
	stop: () => Promise<void>
}

export const startTypingLoop = (
	sendTyping: () => Promise<void>,
	intervalMs = TYPING_INTERVAL_MS
): TypingLoop => {
	const controller = new AbortController()
	const { signal } = controller

	const loop = (async () => {
		while (!signal.aborted) {
			try {
				await sendTyping()
			} catch (err) {
				void logToFile('warn', 'typing indicator failed', { error: errorMessage(err) })
			}
			try {
				await sleep(intervalMs, undefined, { signal })
			} catch (err) {
				if (signal.aborted) return
				throw err
			}
		}
	})()

	return {
		stop: async () => {
			controller.abort()
			await loop
		},
	}
}

/** Runs `task` with the typing loop active for exactly its duration. */
export const withTyping = async <T>(
	sendTyping: () => Promise<void>,
	task: () => Promise<T>,
	intervalMs = TYPING_INTERVAL_MS
): Promise<T> => {
	const typing = startTypingLoop(sendTyping, intervalMs)
	try {
		return await task()
	} finally {
		await typing.stop()
	}
}

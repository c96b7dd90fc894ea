import type { BridgeConfig } from '../gateway/config.js'
import type { ChatReplier, ChatUser, ClaudeResult } from '../protocol/types.js'
import type { ClaudeRunner } from './claude-runner.js'
import { CommandLane, userLane, type CommandQueue } from './command-queue.js'
import { appendConversationLog } from './conversation-log.js'
import {
	chunkMessage,
	EMPTY_REPLY_PLACEHOLDER,
	extractResponseText,
	formatCost,
	resultCost,
} from './response.js'
import type { SessionStore } from './session-store.js'
import { TYPING_INTERVAL_MS, withTyping } from './typing.js'
import { errorMessage, log, logEvent } from '../logging/file.js'

export type ExchangeDeps = {
	store: SessionStore
	runClaude: ClaudeRunner
	queue: CommandQueue
	config: Pick<BridgeConfig, 'defaultModel' | 'logsDir' | 'maxBudgetUsd'>
	typingIntervalMs?: number
}

export type ExchangeOutcome = {
	result: ClaudeResult
	replyText: string
	chunks: string[]
}

const runExchange = async (
	user: ChatUser,
	prompt: string,
	reply: ChatReplier,
	deps: ExchangeDeps
): Promise<ExchangeOutcome> => {
	const { store, queue, config } = deps
	const t0 = Date.now()
	const session = await store.ensure(user.id)

	const waiting = queue.getLaneSize(CommandLane.Claude)
	log(`[exchange] user ${user.id} session ${session.session_id.slice(0, 8)} (#${session.message_count})${waiting ? `, ${waiting} claude run(s) ahead` : ''}`)

	const result = await withTyping(
		reply.typing,
		() => queue.enqueueInLane(CommandLane.Claude, () => deps.runClaude(prompt, session)),
		deps.typingIntervalMs ?? TYPING_INTERVAL_MS
	)

	// Failed exchanges still advance the counter: the CLI may have created the session
	await store.increment(user.id, session.session_id)

	const replyText = extractResponseText(result) || EMPTY_REPLY_PLACEHOLDER

	const cost = resultCost(result)
	if (cost !== undefined && cost > config.maxBudgetUsd) {
		await logEvent('warn', 'exchange cost exceeded budget', {
			userId: user.id,
			sessionId: session.session_id,
			costUsd: cost,
			budgetUsd: config.maxBudgetUsd,
		})
	}

	try {
		await appendConversationLog({
			logsDir: config.logsDir,
			user,
			session,
			prompt,
			result,
			replyText,
			defaultModel: config.defaultModel,
		})
	} catch (err) {
		void logEvent('error', 'conversation log append failed', { userId: user.id, error: errorMessage(err) })
	}

	const chunks = chunkMessage(replyText + formatCost(result))
	for (const chunk of chunks) {
		await reply.send(chunk)
	}

	log(`[exchange] user ${user.id} done in ${Date.now() - t0}ms (${chunks.length} message(s))`)
	return { result, replyText, chunks }
}

/**
 * Forwards one text message to claude and sends the reply back. Messages from
 * the same user are handled in arrival order. Never rejects: an unexpected
 * failure is reported to the user as an error message.
 */
export const processExchange = async (
	message: { user: ChatUser; text?: string },
	reply: ChatReplier,
	deps: ExchangeDeps
): Promise<ExchangeOutcome | undefined> => {
	const prompt = message.text
	if (!prompt) return undefined

	try {
		return await deps.queue.enqueueInLane(userLane(message.user.id), () =>
			runExchange(message.user, prompt, reply, deps)
		)
	} catch (err) {
		const messageText = errorMessage(err)
		void logEvent('error', 'exchange failed', { userId: message.user.id, error: messageText })
		try {
			await reply.send(`Error: ${messageText}`)
		} catch (sendErr) {
			void logEvent('error', 'failed to report exchange error', {
				userId: message.user.id,
				error: errorMessage(sendErr),
			})
		}
		return undefined
	}
}

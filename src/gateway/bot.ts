import { Bot, type Api } from 'grammy'
import type { UserFromGetMe } from 'grammy/types'
import type { BridgeConfig } from './config.js'
import { createAuthGuard } from './auth.js'
import { isCommandMessage, normalizeMessage } from './normalize.js'
import type { ChatReplier } from '../protocol/types.js'
import type { ClaudeRunner } from '../bridge/claude-runner.js'
import type { CommandQueue } from '../bridge/command-queue.js'
import { COMMANDS, handleCommand, parseCommand } from '../bridge/commands.js'
import { processExchange } from '../bridge/exchange.js'
import type { SessionStore } from '../bridge/session-store.js'
import { chunkMessage } from '../bridge/response.js'
import { errorMessage, log, logEvent } from '../logging/file.js'

export type BridgeBotDeps = {
	store: SessionStore
	runClaude: ClaudeRunner
	queue: CommandQueue
	/** Skips getMe; tests pass a fixed identity */
	botInfo?: UserFromGetMe
	typingIntervalMs?: number
}

export type BridgeBotHandle = {
	bot: Bot
	/** Settles when polling stops */
	done: Promise<void>
	stop: () => Promise<void>
}

export const createChatReplier = (api: Api, chatId: number): ChatReplier => ({
	send: async (text) => {
		await api.sendMessage(chatId, text)
	},
	typing: async () => {
		await api.sendChatAction(chatId, 'typing')
	},
})

export const createBridgeBot = (config: BridgeConfig, deps: BridgeBotDeps): Bot => {
	const bot = new Bot(config.botToken, deps.botInfo ? { botInfo: deps.botInfo } : undefined)

	bot.use(createAuthGuard(config))

	bot.command(Object.keys(COMMANDS), async (ctx) => {
		const userId = ctx.from?.id
		const parsed = parseCommand(ctx.msg.text ?? '')
		if (userId === undefined || !parsed) return

		const response = await handleCommand(parsed.name, {
			userId,
			args: parsed.args,
			store: deps.store,
			config,
		})
		if (!response) return
		for (const chunk of chunkMessage(response)) {
			await ctx.reply(chunk)
		}
	})

	bot.on('message:text', (ctx) => {
		// Unknown commands are not forwarded to claude
		if (isCommandMessage(ctx.message)) return

		const incoming = normalizeMessage(ctx.message)
		// Not awaited: grammy handles updates one by one, and other users
		// should not wait for this exchange. Per-user order is kept by the
		// user's lane inside processExchange.
		void processExchange(incoming, createChatReplier(ctx.api, incoming.chatId), {
			store: deps.store,
			runClaude: deps.runClaude,
			queue: deps.queue,
			config,
			typingIntervalMs: deps.typingIntervalMs,
		})
	})

	bot.catch((err) => {
		void logEvent('error', 'bot handler error', {
			updateId: err.ctx.update.update_id,
			error: errorMessage(err.error),
		})
	})

	return bot
}

export const startBridgeBot = async (config: BridgeConfig, deps: BridgeBotDeps): Promise<BridgeBotHandle> => {
	const bot = createBridgeBot(config, deps)
	await bot.init()

	try {
		await bot.api.setMyCommands(
			Object.entries(COMMANDS).map(([command, spec]) => ({ command, description: spec.description }))
		)
	} catch (err) {
		void logEvent('warn', 'failed to register bot commands', { error: errorMessage(err) })
	}

	const done = bot.start({
		onStart: (info) => log(`[bot] Polling as @${info.username}`),
	}).catch(async (err: unknown) => {
		await logEvent('error', 'polling stopped with an error', { error: errorMessage(err) })
		process.exitCode = 1
	})

	return {
		bot,
		done,
		stop: async () => {
			if (bot.isRunning()) await bot.stop()
		},
	}
}

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { Bot, RawApi, Transformer } from 'grammy'
import type { Update, UserFromGetMe } from 'grammy/types'
import { createBridgeBot } from '../src/gateway/bot.js'
import { UNAUTHORIZED_REPLY } from '../src/gateway/auth.js'
import type { BridgeConfig } from '../src/gateway/config.js'
import { createCommandQueue } from '../src/bridge/command-queue.js'
import { createSessionStore } from '../src/bridge/session-store.js'
import type { ClaudeResult, Session } from '../src/protocol/types.js'

type ApiCall = { method: string; payload: unknown }

const botInfo = {
	id: 999,
	is_bot: true,
	first_name: 'Bridge',
	username: 'bridge_test_bot',
	can_join_groups: false,
	can_read_all_group_messages: false,
	supports_inline_queries: false,
} as UserFromGetMe

// Answers every Bot API call in process and records it
const recordCalls = (calls: ApiCall[]): Transformer<RawApi> => async (_prev, method, payload) => {
	calls.push({ method, payload })
	return { ok: true, result: true as never }
}

const textUpdate = (userId: number, text: string, updateId = 1): Update => ({
	update_id: updateId,
	message: {
		message_id: updateId,
		date: 1_700_000_000,
		chat: { id: userId, type: 'private', first_name: 'Test' },
		from: { id: userId, is_bot: false, first_name: 'Test' },
		text,
		entities: text.startsWith('/')
			? [{ type: 'bot_command', offset: 0, length: text.split(' ')[0].length }]
			: undefined,
	},
})

describe('createBridgeBot', () => {
	let dir: string
	let calls: ApiCall[]
	let bot: Bot
	const runClaude = vi.fn<(prompt: string, session: Session) => Promise<ClaudeResult>>()

	const sentTexts = () =>
		calls
			.filter((call) => call.method === 'sendMessage')
			.map((call) => (call.payload as { text: string }).text)

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'bridge-bot-'))
		calls = []
		runClaude.mockReset()
		runClaude.mockResolvedValue({ result: 'hi' })

		const config: BridgeConfig = {
			botToken: 'test-token',
			allowedUserIds: [42],
			allowedTools: [],
			maxBudgetUsd: 1,
			timeoutSeconds: 5,
			claudeCommand: 'claude',
			maxConcurrent: 2,
			stateDir: dir,
			sessionsPath: join(dir, 'sessions.json'),
			logsDir: join(dir, 'logs'),
			configPath: join(dir, 'config.json'),
		}
		const store = await createSessionStore({ path: config.sessionsPath, generateId: () => 'abcdefgh-0001' })
		bot = createBridgeBot(config, {
			store,
			runClaude,
			queue: createCommandQueue(),
			botInfo,
			typingIntervalMs: 60_000,
		})
		bot.api.config.use(recordCalls(calls))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it('rejects users outside the allow-list', async () => {
		await bot.handleUpdate(textUpdate(7, 'hello'))

		expect(sentTexts()).toEqual([UNAUTHORIZED_REPLY])
		expect(runClaude).not.toHaveBeenCalled()
	})

	it('answers commands without calling claude', async () => {
		await bot.handleUpdate(textUpdate(42, '/status'))

		expect(sentTexts()).toEqual(['Session ID: abcdefgh...\nModel: default\nMessages: 0'])
		expect(runClaude).not.toHaveBeenCalled()
	})

	it('does not forward unknown commands', async () => {
		await bot.handleUpdate(textUpdate(42, '/deploy now'))

		expect(sentTexts()).toEqual([])
		expect(runClaude).not.toHaveBeenCalled()
	})

	it('forwards text to claude and replies in the chat', async () => {
		await bot.handleUpdate(textUpdate(42, 'hello claude'))

		await vi.waitFor(() => expect(sentTexts()).toEqual(['hi']))
		expect(runClaude).toHaveBeenCalledWith('hello claude', {
			session_id: 'abcdefgh-0001',
			model: null,
			message_count: 0,
		})
		expect(calls.some((call) => call.method === 'sendChatAction')).toBe(true)
	})
})

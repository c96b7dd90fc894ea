import type { BridgeConfig } from '../gateway/config.js'
import type { SessionStore } from './session-store.js'
import { formatConversationLogs, readRecentConversationLogs } from './conversation-log.js'
import { effectiveModel, MODEL_ALIASES, normalizeModelName } from './models.js'

export type CommandConfig = Pick<BridgeConfig, 'defaultModel' | 'workingDirectory' | 'allowedTools' | 'logsDir'>

export type CommandContext = {
	userId: number
	args: string[]
	store: SessionStore
	config: CommandConfig
}

type CommandSpec = {
	description: string
	run: (ctx: CommandContext) => Promise<string>
}

export const DEFAULT_LOG_COUNT = 5
export const MAX_LOG_COUNT = 20

export const HELP_TEXT = [
	"Hello! I'm a bridge to the claude CLI.",
	'',
	"Send me any message and I'll forward it to Claude.",
	'',
	'Commands:',
	'/reset - Start a new conversation',
	`/model <name> - Switch model (${MODEL_ALIASES.join('/')})`,
	'/status - Show session info',
	`/logs [n] - Show last n conversations (default ${DEFAULT_LOG_COUNT})`,
	'/help - Show this message',
].join('\n')

const shortId = (sessionId: string) => `${sessionId.slice(0, 8)}...`

const help = async ({ userId, store }: CommandContext) => {
	await store.ensure(userId)
	return HELP_TEXT
}

/** `/logs 3` → 3, capped; a non-integer argument keeps the default */
export const parseLogCount = (arg?: string): number => {
	if (!arg || !/^[+-]?\d+$/.test(arg.trim())) return DEFAULT_LOG_COUNT
	const parsed = Number.parseInt(arg, 10)
	return Math.max(1, Math.min(parsed, MAX_LOG_COUNT))
}

export const COMMANDS: Record<string, CommandSpec> = {
	start: { description: 'Show the welcome message', run: help },
	help: { description: 'Show available commands', run: help },

	reset: {
		description: 'Start a new conversation',
		run: async ({ userId, store }) => {
			const session = await store.reset(userId)
			return `Session reset. New session ID: ${shortId(session.session_id)}`
		},
	},

	model: {
		description: 'Switch model (sonnet/opus/haiku)',
		run: async ({ userId, args, store, config }) => {
			if (args.length === 0) {
				const session = await store.ensure(userId)
				return `Current model: ${effectiveModel(session, config.defaultModel)}\nUsage: /model <name>`
			}
			const model = normalizeModelName(args[0])
			await store.setModel(userId, model)
			return `Model set to: ${model}`
		},
	},

	status: {
		description: 'Show session info',
		run: async ({ userId, store, config }) => {
			const session = await store.ensure(userId)
			const lines = [
				`Session ID: ${shortId(session.session_id)}`,
				`Model: ${effectiveModel(session, config.defaultModel)}`,
				`Messages: ${session.message_count}`,
			]
			if (config.workingDirectory) {
				lines.push(`Working dir: ${config.workingDirectory}`)
			}
			if (config.allowedTools.length > 0) {
				lines.push(`Allowed tools: ${config.allowedTools.join(',')}`)
			}
			return lines.join('\n')
		},
	},

	logs: {
		description: 'Show recent conversations',
		run: async ({ userId, args, config }) => {
			const entries = await readRecentConversationLogs({
				logsDir: config.logsDir,
				userId,
				count: parseLogCount(args[0]),
			})
			if (entries.length === 0) return 'No conversation logs found.'
			return formatConversationLogs(entries)
		},
	},
}

export type ParsedCommand = {
	name: string
	args: string[]
}

/** `/model@my_bot opus` → `{ name: 'model', args: ['opus'] }`; non-commands → undefined */
export const parseCommand = (text: string): ParsedCommand | undefined => {
	const trimmed = text.trim()
	if (!trimmed.startsWith('/')) return undefined
	const [head, ...args] = trimmed.split(/\s+/)
	const name = head.slice(1).split('@')[0].toLowerCase()
	if (!name) return undefined
	return { name, args }
}

/** Reply text for a known command, or undefined when the command is unknown. */
export const handleCommand = async (name: string, ctx: CommandContext): Promise<string | undefined> => {
	const spec = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined
	if (!spec) return undefined
	return spec.run(ctx)
}

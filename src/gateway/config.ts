import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import { parseEnvFile } from '../bridge/env-file.js'
import { errorMessage, logWarn } from '../logging/file.js'

export type BridgeConfig = {
	botToken: string
	allowedUserIds: number[]
	/** Process-wide default model; sessions without their own model inherit it */
	defaultModel?: string
	/** cwd of the claude subprocess; unset means this process's cwd */
	workingDirectory?: string
	allowedTools: string[]
	/** Per-exchange cost budget in USD, checked against the reported cost_usd */
	maxBudgetUsd: number
	timeoutSeconds: number
	claudeCommand: string
	/** Extra env file merged into the subprocess environment */
	envFile?: string
	/** Upper bound on claude subprocesses running at once, across all users */
	maxConcurrent: number
	stateDir: string
	sessionsPath: string
	logsDir: string
	configPath: string
}

/** Shape of the optional JSON config file; env values win over it. */
export type FileConfig = Partial<{
	botToken: string
	allowedUserIds: number[]
	defaultModel: string
	workingDirectory: string
	allowedTools: string[]
	maxBudgetUsd: number
	timeoutSeconds: number
	claudeCommand: string
	envFile: string
	maxConcurrent: number
}>

export type LoadConfigOptions = {
	configPath?: string
	env?: NodeJS.ProcessEnv
	/** Directory searched for a .env file */
	cwd?: string
}

export const DEFAULT_TIMEOUT_SECONDS = 300
export const DEFAULT_MAX_BUDGET_USD = 1.0
export const DEFAULT_MAX_CONCURRENT = 4

const resolveDefaultStateDir = () => join(homedir(), '.config', 'tg-claude-bridge')

const expandHome = (path: string): string => {
	if (path.startsWith('~/')) return join(homedir(), path.slice(2))
	return path
}

const parseNumber = (value?: string, fallback?: number) => {
	if (!value) return fallback
	const parsed = Number(value)
	return Number.isNaN(parsed) ? fallback : parsed
}

const parseList = (value: string): string[] =>
	value.split(',').map((item) => item.trim()).filter(Boolean)

const parseUserIds = (envValue?: string, fileValue?: number[]): number[] => {
	if (envValue) {
		return parseList(envValue)
			.map((id) => Number.parseInt(id, 10))
			.filter((id) => !Number.isNaN(id))
	}
	return fileValue ?? []
}

const nonEmpty = (value?: string) => (value && value.trim() ? value.trim() : undefined)

const stringField = (value: unknown) => (typeof value === 'string' ? value : undefined)
const numberField = (value: unknown) => (typeof value === 'number' && Number.isFinite(value) ? value : undefined)
const arrayField = <T>(value: unknown, isItem: (item: unknown) => item is T): T[] | undefined =>
	Array.isArray(value) ? value.filter(isItem) : undefined

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value)
const isString = (item: unknown): item is string => typeof item === 'string'
const isInteger = (item: unknown): item is number => Number.isInteger(item)

const parseConfigFile = async (configPath: string): Promise<FileConfig> => {
	const raw = await readFile(configPath, 'utf-8')
	const parsed: unknown = JSON.parse(raw)
	if (!isRecord(parsed)) return {}
	return {
		botToken: stringField(parsed.botToken),
		allowedUserIds: arrayField(parsed.allowedUserIds, isInteger),
		defaultModel: stringField(parsed.defaultModel),
		workingDirectory: stringField(parsed.workingDirectory),
		allowedTools: arrayField(parsed.allowedTools, isString),
		maxBudgetUsd: numberField(parsed.maxBudgetUsd),
		timeoutSeconds: numberField(parsed.timeoutSeconds),
		claudeCommand: stringField(parsed.claudeCommand),
		envFile: stringField(parsed.envFile),
		maxConcurrent: numberField(parsed.maxConcurrent),
	}
}

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<BridgeConfig> => {
	const dotenv = parseEnvFile(join(options.cwd ?? process.cwd(), '.env'), { optional: true })
	// Real environment wins over .env, like dotenv's default
	const env: NodeJS.ProcessEnv = { ...dotenv, ...(options.env ?? process.env) }

	const stateDir = resolve(expandHome(nonEmpty(env.BRIDGE_STATE_DIR) ?? resolveDefaultStateDir()))
	const configPath = options.configPath ?? nonEmpty(env.BRIDGE_CONFIG) ?? join(stateDir, 'config.json')

	let fileConfig: FileConfig = {}
	try {
		fileConfig = await parseConfigFile(configPath)
	} catch (err) {
		const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT'
		if (!missing) {
			logWarn(`[config] Ignoring unreadable config file ${configPath}:`, errorMessage(err))
		}
	}

	const allowedTools = env.CLAUDE_ALLOWED_TOOLS !== undefined
		? parseList(env.CLAUDE_ALLOWED_TOOLS)
		: fileConfig.allowedTools ?? []
	const envFile = nonEmpty(env.CLAUDE_ENV_FILE) ?? fileConfig.envFile

	return {
		botToken: nonEmpty(env.TELEGRAM_BOT_TOKEN) ?? fileConfig.botToken ?? '',
		allowedUserIds: parseUserIds(env.ALLOWED_USER_IDS, fileConfig.allowedUserIds),
		defaultModel: nonEmpty(env.CLAUDE_MODEL) ?? fileConfig.defaultModel,
		workingDirectory: nonEmpty(env.CLAUDE_WORKING_DIR) ?? fileConfig.workingDirectory,
		allowedTools,
		maxBudgetUsd:
			parseNumber(env.CLAUDE_MAX_BUDGET_USD, fileConfig.maxBudgetUsd ?? DEFAULT_MAX_BUDGET_USD) ??
			DEFAULT_MAX_BUDGET_USD,
		timeoutSeconds:
			parseNumber(env.CLAUDE_TIMEOUT_SECONDS, fileConfig.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS) ??
			DEFAULT_TIMEOUT_SECONDS,
		claudeCommand: nonEmpty(env.CLAUDE_COMMAND) ?? fileConfig.claudeCommand ?? 'claude',
		envFile: envFile ? expandHome(envFile) : undefined,
		maxConcurrent: Math.max(
			1,
			Math.floor(
				parseNumber(env.CLAUDE_MAX_CONCURRENT, fileConfig.maxConcurrent ?? DEFAULT_MAX_CONCURRENT) ??
					DEFAULT_MAX_CONCURRENT
			)
		),
		stateDir,
		sessionsPath: join(stateDir, 'sessions.json'),
		logsDir: join(stateDir, 'logs'),
		configPath,
	}
}

/** Problems that must stop the process before it talks to Telegram. */
export const validateConfig = (config: BridgeConfig): string[] => {
	const problems: string[] = []
	if (!config.botToken) {
		problems.push('Error: TELEGRAM_BOT_TOKEN not set. Copy .env.example to .env and fill it in.')
	}
	if (config.allowedUserIds.length === 0) {
		problems.push('Error: ALLOWED_USER_IDS not set. Add your Telegram user ID to .env.')
	}
	return problems
}

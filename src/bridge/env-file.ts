import { readFileSync } from 'node:fs'
import { errorMessage, logWarn } from '../logging/file.js'

/** Set by a parent claude session; a child that sees it behaves as a nested agent. */
export const NESTED_AGENT_ENV_KEY = 'CLAUDECODE'

/**
 * Parse shell-style env text (supports `export KEY=value` and `KEY=value`).
 * Handles quoted values and comments.
 */
export const parseEnvText = (content: string): Record<string, string> => {
	const env: Record<string, string> = {}

	for (const line of content.split('\n')) {
		const trimmed = line.trim()
		if (!trimmed || trimmed.startsWith('#')) continue

		const withoutExport = trimmed.startsWith('export ')
			? trimmed.slice(7)
			: trimmed

		const eqIndex = withoutExport.indexOf('=')
		if (eqIndex === -1) continue

		const key = withoutExport.slice(0, eqIndex).trim()
		let value = withoutExport.slice(eqIndex + 1).trim()

		if ((value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
			(value.startsWith("'") && value.endsWith("'") && value.length >= 2)) {
			value = value.slice(1, -1)
		}

		if (/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
			env[key] = value
		}
	}

	return env
}

export type ParseEnvFileOptions = {
	/** Missing files are expected (e.g. an optional .env); skip the warning. */
	optional?: boolean
}

export const parseEnvFile = (filePath: string, options: ParseEnvFileOptions = {}): Record<string, string> => {
	let content: string
	try {
		content = readFileSync(filePath, 'utf-8')
	} catch (err) {
		const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT'
		if (!(options.optional && missing)) {
			logWarn(`[env-file] Failed to read ${filePath}:`, errorMessage(err))
		}
		return {}
	}
	return parseEnvText(content)
}

const envFileCache = new Map<string, Record<string, string>>()

/**
 * Environment for the claude subprocess: the parent env, overlaid with the
 * optional env file, minus the nested-agent marker.
 */
export const buildChildEnv = (
	baseEnv: NodeJS.ProcessEnv,
	envFilePath?: string
): NodeJS.ProcessEnv => {
	let fileEnv: Record<string, string> = {}
	if (envFilePath) {
		const cached = envFileCache.get(envFilePath)
		if (cached) {
			fileEnv = cached
		} else {
			fileEnv = parseEnvFile(envFilePath)
			envFileCache.set(envFilePath, fileEnv)
		}
	}

	const env: NodeJS.ProcessEnv = { ...baseEnv, ...fileEnv }
	delete env[NESTED_AGENT_ENV_KEY]
	return env
}

import { loadConfig, validateConfig, type BridgeConfig } from '../gateway/config.js'
import { startBridgeBot, type BridgeBotHandle } from '../gateway/bot.js'
import { createClaudeRunner } from '../bridge/claude-runner.js'
import { CommandLane, createCommandQueue } from '../bridge/command-queue.js'
import { createSessionStore } from '../bridge/session-store.js'
import { errorMessage, log, logEvent, logWarn, setLogDir } from '../logging/file.js'
import { removePidFile, writePidFile } from './pid.js'

export type RunOptions = {
	configPath?: string
	env?: NodeJS.ProcessEnv
}

const describeConfig = (config: BridgeConfig) => {
	log(`Starting bot with ${config.allowedUserIds.length} allowed user(s)`)
	log(`Claude model: ${config.defaultModel ?? 'default'}`)
	if (config.workingDirectory) log(`Working dir: ${config.workingDirectory}`)
	if (config.allowedTools.length > 0) log(`Allowed tools: ${config.allowedTools.join(',')}`)
	log(`Timeout: ${config.timeoutSeconds}s, budget: $${config.maxBudgetUsd.toFixed(2)} per exchange, max concurrent: ${config.maxConcurrent}`)
	log(`State dir: ${config.stateDir}`)
}

/**
 * Loads config, refuses to start without a token or allow-list, then polls
 * Telegram until SIGINT/SIGTERM. Returns undefined when config is invalid.
 */
export const runBridge = async (options: RunOptions = {}): Promise<BridgeBotHandle | undefined> => {
	const config = await loadConfig({ configPath: options.configPath, env: options.env })

	const problems = validateConfig(config)
	if (problems.length > 0) {
		for (const problem of problems) {
			process.stdout.write(`${problem}\n`)
		}
		process.exitCode = 1
		return undefined
	}

	setLogDir(config.stateDir)
	describeConfig(config)

	const store = await createSessionStore({ path: config.sessionsPath, defaultModel: config.defaultModel })
	log(`Loaded ${store.size()} session(s) from ${config.sessionsPath}`)

	const queue = createCommandQueue()
	queue.setLaneConcurrency(CommandLane.Claude, config.maxConcurrent)

	const runClaude = createClaudeRunner({
		command: config.claudeCommand,
		defaultModel: config.defaultModel,
		allowedTools: config.allowedTools,
		workingDirectory: config.workingDirectory,
		timeoutSeconds: config.timeoutSeconds,
		envFile: config.envFile,
	})

	const handle = await startBridgeBot(config, { store, runClaude, queue })
	await writePidFile(config.stateDir, process.pid)
	void logEvent('info', 'bridge started', { pid: process.pid })

	let shuttingDown = false
	const shutdown = async () => {
		if (shuttingDown) return
		shuttingDown = true
		log('Shutting down...')
		try {
			await handle.stop()
		} catch (err) {
			await logEvent('error', 'failed to stop polling', { error: errorMessage(err) })
		}
		try {
			await removePidFile(config.stateDir)
		} catch (err) {
			logWarn('Failed to remove pid file:', errorMessage(err))
		}
		process.exit(0)
	}

	process.on('SIGTERM', () => void shutdown())
	process.on('SIGINT', () => void shutdown())

	return handle
}

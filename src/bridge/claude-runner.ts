import { spawn, type ChildProcess } from 'node:child_process'
import type { ClaudeResult, Session } from '../protocol/types.js'
import { buildChildEnv } from './env-file.js'
import { errorMessage, log, logEvent } from '../logging/file.js'

/** Upper bound on agentic turns inside one invocation */
export const MAX_TURNS = 50

export type ClaudeArgsOptions = {
	defaultModel?: string
	allowedTools?: string[]
}

export type ClaudeRunnerOptions = ClaudeArgsOptions & {
	command: string
	workingDirectory?: string
	timeoutSeconds: number
	envFile?: string
	/** Base environment for the child; defaults to process.env */
	env?: NodeJS.ProcessEnv
}

export type ClaudeRunner = (prompt: string, session: Session) => Promise<ClaudeResult>

/**
 * `-p --output-format json`, then session, model, tool and permission flags,
 * with the prompt always last.
 */
export const buildClaudeArgs = (
	prompt: string,
	session: Session,
	options: ClaudeArgsOptions = {}
): string[] => {
	const args = ['-p', '--output-format', 'json']

	// First exchange creates the session under our id; later ones resume it
	if (session.message_count === 0) {
		args.push('--session-id', session.session_id)
	} else {
		args.push('--resume', session.session_id)
	}

	const model = session.model ?? options.defaultModel
	if (model) {
		args.push('--model', model)
	}

	const tools = (options.allowedTools ?? []).map((tool) => tool.trim()).filter(Boolean)
	if (tools.length > 0) {
		args.push('--allowedTools', ...tools)
	}

	// No human can answer an approval prompt here: deny instead of blocking
	args.push('--permission-mode', 'dontAsk')
	args.push('--max-turns', String(MAX_TURNS))

	args.push(prompt)
	return args
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value)

/** JSON object output, or the raw text when the CLI printed something else. */
export const parseClaudeOutput = (stdout: string): ClaudeResult => {
	const raw = stdout.trim()
	try {
		const parsed: unknown = JSON.parse(raw)
		if (isRecord(parsed)) return parsed
	} catch {
		// plain text fallback below
	}
	return { result: raw }
}

/**
 * Runs one claude invocation. Resolves with a `{ error }` result on timeout,
 * spawn failure or non-zero exit; never rejects.
 */
export const runClaude = (
	prompt: string,
	session: Session,
	options: ClaudeRunnerOptions
): Promise<ClaudeResult> => {
	const args = buildClaudeArgs(prompt, session, options)
	const timeoutMs = options.timeoutSeconds * 1000

	log(`[claude-runner] Spawning: ${options.command} ${args.slice(0, -1).join(' ')} "<prompt>"`)

	return new Promise<ClaudeResult>((resolve) => {
		let child: ChildProcess
		try {
			child = spawn(options.command, args, {
				cwd: options.workingDirectory,
				env: buildChildEnv(options.env ?? process.env, options.envFile),
				stdio: ['pipe', 'pipe', 'pipe'],
			})
		} catch (err) {
			resolve({ error: `Claude CLI error: ${errorMessage(err)}` })
			return
		}

		// Prompt travels as an argument; nothing is written to stdin
		child.stdin?.end()

		const stdout: Buffer[] = []
		const stderr: Buffer[] = []
		child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk))
		child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk))

		let settled = false
		let timedOut = false

		const finish = (result: ClaudeResult) => {
			if (settled) return
			settled = true
			clearTimeout(timer)
			resolve(result)
		}

		const timedOutResult = () => ({ error: `Claude timed out after ${options.timeoutSeconds}s` })

		const timer = setTimeout(() => {
			timedOut = true
			void logEvent('warn', 'claude timed out, killing', {
				pid: child.pid,
				timeoutSeconds: options.timeoutSeconds,
			})
			// Grandchildren may still hold the pipes open; stop waiting on them
			child.stdout?.destroy()
			child.stderr?.destroy()
			if (child.exitCode !== null || child.signalCode !== null) {
				finish(timedOutResult())
				return
			}
			child.kill('SIGKILL')
		}, timeoutMs)

		child.on('exit', () => {
			if (timedOut) finish(timedOutResult())
		})

		child.on('error', (err) => {
			if (timedOut) return
			void logEvent('error', 'claude failed to start', { command: options.command, error: err.message })
			finish({ error: `Claude CLI error: ${err.message}` })
		})

		// 'close' waits for stdio to drain; a timed-out run settles on 'exit' instead
		child.on('close', (code) => {
			if (timedOut) {
				finish(timedOutResult())
				return
			}

			if (code !== 0) {
				const err = Buffer.concat(stderr).toString('utf-8').trim()
				void logEvent('error', 'claude exited with an error', { code, stderr: err })
				finish({ error: `Claude CLI error: ${err || 'unknown error'}` })
				return
			}

			finish(parseClaudeOutput(Buffer.concat(stdout).toString('utf-8')))
		})
	})
}

export const createClaudeRunner = (options: ClaudeRunnerOptions): ClaudeRunner =>
	(prompt, session) => runClaude(prompt, session, options)

#!/usr/bin/env node
import { Command } from 'commander'
import { spawn } from 'node:child_process'
import process from 'node:process'
import { loadConfig } from '../gateway/config.js'
import { formatConversationLogs, readRecentConversationLogs } from '../bridge/conversation-log.js'
import { parseLogCount } from '../bridge/commands.js'
import { readPidFile } from './pid.js'
import { runBridge } from './run.js'

const resolveStateDir = async (configPath?: string) => (await loadConfig({ configPath })).stateDir

const program = new Command()
program
	.name('tg-claude-bridge')
	.description('Telegram bot that relays messages to the claude CLI')
	.version('0.1.0')

program
	.command('start')
	.option('-c, --config <path>', 'config file path')
	.option('--daemon', 'run in background')
	.option('--child', 'internal flag for daemon child process')
	.action(async (options: { config?: string; daemon?: boolean; child?: boolean }) => {
		if (options.daemon && !options.child) {
			const args = process.argv.slice(2).filter((arg) => arg !== '--daemon')
			args.push('--child')
			const child = spawn(process.execPath, [process.argv[1], ...args], {
				detached: true,
				stdio: 'ignore',
			})
			child.unref()
			process.stdout.write(`started in background (pid ${child.pid})\n`)
			return
		}

		const handle = await runBridge({ configPath: options.config })
		if (handle) {
			process.stdout.write('tg-claude-bridge running\n')
		}
	})

program
	.command('stop')
	.option('-c, --config <path>', 'config file path')
	.action(async (options: { config?: string }) => {
		try {
			const { pid, pidPath } = await readPidFile(await resolveStateDir(options.config))
			process.kill(pid, 'SIGTERM')
			process.stdout.write(`stopped (pid ${pid}) from ${pidPath}\n`)
		} catch {
			process.stdout.write('no running bridge found\n')
		}
	})

program
	.command('status')
	.option('-c, --config <path>', 'config file path')
	.action(async (options: { config?: string }) => {
		try {
			const { pid } = await readPidFile(await resolveStateDir(options.config))
			process.kill(pid, 0)
			process.stdout.write(`running (pid ${pid})\n`)
		} catch {
			process.stdout.write('not running\n')
		}
	})

program
	.command('logs')
	.description('print recent conversations of a user')
	.requiredOption('-u, --user <id>', 'Telegram user id')
	.option('-n, --count <n>', 'number of entries')
	.option('-c, --config <path>', 'config file path')
	.action(async (options: { user: string; count?: string; config?: string }) => {
		const userId = Number.parseInt(options.user, 10)
		if (Number.isNaN(userId)) {
			process.stderr.write(`invalid user id: ${options.user}\n`)
			process.exitCode = 1
			return
		}
		const config = await loadConfig({ configPath: options.config })
		const entries = await readRecentConversationLogs({
			logsDir: config.logsDir,
			userId,
			count: parseLogCount(options.count),
		})
		process.stdout.write(entries.length ? `${formatConversationLogs(entries)}\n` : 'No conversation logs found.\n')
	})

program.parseAsync(process.argv).catch((err: unknown) => {
	process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`)
	process.exitCode = 1
})

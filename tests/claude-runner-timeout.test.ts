import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { runClaude } from '../src/bridge/claude-runner.js'

// Real processes: a stand-in CLI whose background child keeps stdout open
describe.skipIf(process.platform === 'win32')('runClaude timeout with a real process', () => {
	let dir: string
	let command: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'runner-timeout-'))
		command = join(dir, 'fake-claude.sh')
		await writeFile(command, '#!/bin/sh\nsleep 3 &\nsleep 3\n', 'utf-8')
		await chmod(command, 0o755)
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it('returns soon after the timeout even when a grandchild holds the pipes', async () => {
		const startedAt = Date.now()
		const result = await runClaude('hello', { session_id: 'sess-1', model: null, message_count: 0 }, {
			command,
			timeoutSeconds: 0.3,
			env: { PATH: process.env.PATH ?? '/usr/bin:/bin' },
		})

		expect(result).toEqual({ error: 'Claude timed out after 0.3s' })
		expect(Date.now() - startedAt).toBeLessThan(2000)
	})
})

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createSessionStore, loadSessionMap } from '../src/bridge/session-store.js'

const sequentialIds = () => {
	let n = 0
	return () => `id-${++n}`
}

describe('createSessionStore', () => {
	let dir: string
	let path: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'session-store-'))
		path = join(dir, 'sessions.json')
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it('returns undefined for an unknown user', async () => {
		const store = await createSessionStore({ path })
		expect(store.get(123)).toBeUndefined()
	})

	it('creates a session on ensure and persists it', async () => {
		const store = await createSessionStore({ path, generateId: sequentialIds(), defaultModel: 'sonnet' })
		const session = await store.ensure(123)

		expect(session).toEqual({ session_id: 'id-1', model: 'sonnet', message_count: 0 })
		const onDisk = JSON.parse(await readFile(path, 'utf-8'))
		expect(onDisk).toEqual({ '123': { session_id: 'id-1', model: 'sonnet', message_count: 0 } })
	})

	it('uses null model when no default is configured', async () => {
		const store = await createSessionStore({ path, generateId: sequentialIds() })
		expect((await store.ensure(1)).model).toBeNull()
	})

	it('ensure is idempotent', async () => {
		const store = await createSessionStore({ path })
		const first = await store.ensure(42)
		const second = await store.ensure(42)
		expect(second).toEqual(first)
		expect(store.size()).toBe(1)
	})

	it('reset replaces the id, keeps the model and zeroes the counter', async () => {
		const store = await createSessionStore({ path })
		await store.setModel(7, 'opus')
		await store.increment(7)
		await store.increment(7)
		const before = store.get(7)

		const after = await store.reset(7)
		expect(after.session_id).not.toBe(before?.session_id)
		expect(after.model).toBe('opus')
		expect(after.message_count).toBe(0)
		expect(store.get(7)).toEqual(after)
	})

	it('reset of an unknown user uses the default model', async () => {
		const store = await createSessionStore({ path, generateId: sequentialIds(), defaultModel: 'haiku' })
		expect(await store.reset(9)).toEqual({ session_id: 'id-1', model: 'haiku', message_count: 0 })
	})

	it('increment raises the counter by exactly N', async () => {
		const store = await createSessionStore({ path })
		await store.ensure(5)
		for (let i = 0; i < 4; i++) {
			await store.increment(5)
		}
		expect(store.get(5)?.message_count).toBe(4)
	})

	it('increment for a replaced session leaves the new session untouched', async () => {
		const store = await createSessionStore({ path, generateId: sequentialIds() })
		const running = await store.ensure(5)
		await store.reset(5)

		const after = await store.increment(5, running.session_id)
		expect(after).toEqual({ session_id: 'id-2', model: null, message_count: 0 })
		expect(store.get(5)?.message_count).toBe(0)

		await store.increment(5, 'id-2')
		expect(store.get(5)?.message_count).toBe(1)
	})

	it('serializes concurrent mutations', async () => {
		const store = await createSessionStore({ path })
		await Promise.all([
			store.increment(1),
			store.increment(1),
			store.increment(2),
			store.increment(1),
		])
		expect(store.get(1)?.message_count).toBe(3)
		expect(store.get(2)?.message_count).toBe(1)

		const onDisk = JSON.parse(await readFile(path, 'utf-8'))
		expect(onDisk['1'].message_count).toBe(3)
		expect(onDisk['2'].message_count).toBe(1)
	})

	it('setModel creates the session when missing', async () => {
		const store = await createSessionStore({ path, generateId: sequentialIds() })
		const session = await store.setModel(11, 'opus')
		expect(session).toEqual({ session_id: 'id-1', model: 'opus', message_count: 0 })
	})

	it('returns copies that cannot change stored state', async () => {
		const store = await createSessionStore({ path })
		const session = await store.ensure(3)
		session.message_count = 99
		expect(store.get(3)?.message_count).toBe(0)
	})

	it('reloads sessions written by a previous instance', async () => {
		const first = await createSessionStore({ path, generateId: sequentialIds() })
		await first.setModel(8, 'sonnet')
		await first.increment(8)

		const second = await createSessionStore({ path })
		expect(second.get(8)).toEqual({ session_id: 'id-1', model: 'sonnet', message_count: 1 })
	})

	it('starts empty and keeps working when the file is corrupt', async () => {
		await writeFile(path, '{not json', 'utf-8')
		const store = await createSessionStore({ path, generateId: sequentialIds() })
		expect(store.size()).toBe(0)

		await store.ensure(1)
		const onDisk = JSON.parse(await readFile(path, 'utf-8'))
		expect(onDisk).toEqual({ '1': { session_id: 'id-1', model: null, message_count: 0 } })
	})
})

describe('loadSessionMap', () => {
	it('returns an empty map for a missing file', async () => {
		expect(await loadSessionMap(join(tmpdir(), `missing-${Date.now()}.json`))).toEqual({})
	})

	it('treats a non-object JSON value as corrupt', async () => {
		const dir = await mkdtemp(join(tmpdir(), 'session-map-'))
		const path = join(dir, 'sessions.json')
		await writeFile(path, '[1, 2, 3]', 'utf-8')
		expect(await loadSessionMap(path)).toEqual({})
		await rm(dir, { recursive: true, force: true })
	})

	it('drops malformed entries and fills missing fields', async () => {
		const dir = await mkdtemp(join(tmpdir(), 'session-map-'))
		const path = join(dir, 'sessions.json')
		await writeFile(
			path,
			JSON.stringify({
				'1': { session_id: 'abc' },
				'2': { model: 'opus' },
				'3': 'nope',
			}),
			'utf-8',
		)
		expect(await loadSessionMap(path)).toEqual({
			'1': { session_id: 'abc', model: null, message_count: 0 },
		})
		await rm(dir, { recursive: true, force: true })
	})
})

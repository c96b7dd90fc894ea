import { describe, it, expect, vi } from 'vitest'
import { startTypingLoop, withTyping } from '../src/bridge/typing.js'

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms))

describe('startTypingLoop', () => {
	it('sends immediately, then repeats on the interval', async () => {
		const sendTyping = vi.fn(async () => undefined)
		const loop = startTypingLoop(sendTyping, 20)
		expect(sendTyping).toHaveBeenCalledTimes(1)

		await wait(90)
		await loop.stop()
		expect(sendTyping.mock.calls.length).toBeGreaterThanOrEqual(3)
	})

	it('stops mid-sleep without rejecting', async () => {
		const sendTyping = vi.fn(async () => undefined)
		const loop = startTypingLoop(sendTyping, 60_000)
		await wait(10)

		await expect(loop.stop()).resolves.toBeUndefined()
		expect(sendTyping).toHaveBeenCalledTimes(1)
	})

	it('sends nothing after stop', async () => {
		const sendTyping = vi.fn(async () => undefined)
		const loop = startTypingLoop(sendTyping, 10)
		await wait(25)
		await loop.stop()

		const calls = sendTyping.mock.calls.length
		await wait(40)
		expect(sendTyping.mock.calls.length).toBe(calls)
	})

	it('keeps going when sending fails', async () => {
		const sendTyping = vi.fn(async () => {
			throw new Error('network down')
		})
		const loop = startTypingLoop(sendTyping, 10)
		await wait(60)

		await expect(loop.stop()).resolves.toBeUndefined()
		expect(sendTyping.mock.calls.length).toBeGreaterThanOrEqual(2)
	})
})

describe('withTyping', () => {
	it('returns the task result with typing active only while it runs', async () => {
		const sendTyping = vi.fn(async () => undefined)
		const result = await withTyping(sendTyping, async () => {
			await wait(5)
			return 'reply'
		}, 60_000)

		expect(result).toBe('reply')
		expect(sendTyping).toHaveBeenCalledTimes(1)
	})

	it('stops typing and rethrows when the task throws', async () => {
		const sendTyping = vi.fn(async () => undefined)
		await expect(
			withTyping(sendTyping, async () => {
				throw new Error('task failed')
			}, 60_000)
		).rejects.toThrow('task failed')
		expect(sendTyping).toHaveBeenCalledTimes(1)
	})
})

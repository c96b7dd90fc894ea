import { describe, expect, it } from 'vitest'
import type { Message } from 'grammy/types'
import { isCommandMessage, normalizeMessage } from '../src/gateway/normalize.js'

const textMessage = (overrides: Partial<Message> = {}) =>
	({
		message_id: 1,
		date: 1_700_000_000,
		chat: { id: 123, type: 'private', first_name: 'Test' },
		from: { id: 456, is_bot: false, first_name: 'Test', username: 'tester' },
		text: 'hello',
		...overrides,
	}) as unknown as Message

describe('normalizeMessage', () => {
	it('normalizes text messages', () => {
		expect(normalizeMessage(textMessage())).toEqual({
			chatId: 123,
			user: { id: 456, username: 'tester' },
			text: 'hello',
		})
	})

	it('falls back to the chat when there is no sender', () => {
		const normalized = normalizeMessage(textMessage({ from: undefined }))
		expect(normalized.user).toEqual({ id: 123 })
	})
})

describe('isCommandMessage', () => {
	it('detects a leading bot command', () => {
		const message = textMessage({ text: '/status', entities: [{ type: 'bot_command', offset: 0, length: 7 }] })
		expect(isCommandMessage(message)).toBe(true)
	})

	it('ignores plain text and commands later in the text', () => {
		expect(isCommandMessage(textMessage())).toBe(false)
		const message = textMessage({ text: 'try /status', entities: [{ type: 'bot_command', offset: 4, length: 7 }] })
		expect(isCommandMessage(message)).toBe(false)
	})
})

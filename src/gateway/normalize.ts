import type { Message } from 'grammy/types'
import type { IncomingMessage } from '../protocol/types.js'

/** True for messages that open with a /command entity. */
export const isCommandMessage = (message: Message): boolean =>
	(message.entities ?? []).some((entity) => entity.type === 'bot_command' && entity.offset === 0)

export const normalizeMessage = (message: Message): IncomingMessage => {
	const from = message.from
	return {
		chatId: message.chat.id,
		// Channel posts carry no sender; fall back to the chat itself
		user: from
			? { id: from.id, username: from.username }
			: { id: message.chat.id },
		text: message.text,
	}
}

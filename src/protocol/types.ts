/**
 * One conversation thread per Telegram user. Field names match sessions.json.
 */
export type Session = {
	session_id: string
	/** null inherits the process-wide default model */
	model: string | null
	message_count: number
}

export type SessionMap = Record<string, Session>

/**
 * Output of one claude invocation: the parsed JSON object on success
 * (`result`, `cost_usd`, `session_id`, ...), or `{ error }` produced by the
 * runner on any failure.
 */
export type ClaudeResult = Record<string, unknown>

export type ChatUser = {
	id: number
	username?: string
}

export type IncomingMessage = {
	chatId: number
	user: ChatUser
	text?: string
}

export type ConversationLogEntry = {
	timestamp: string
	user_id: number
	username: string | null
	session_id: string
	model: string
	prompt: string
	response_preview: string
	cost_usd: number | null
	error: string | null
}

/** The two calls an exchange makes back into the chat platform. */
export type ChatReplier = {
	send: (text: string) => Promise<void>
	typing: () => Promise<void>
}

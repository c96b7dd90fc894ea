import type { Context, MiddlewareFn } from 'grammy'
import type { BridgeConfig } from './config.js'
import { logEvent } from '../logging/file.js'

export const UNAUTHORIZED_REPLY = 'Sorry, you are not authorized to use this bot.'

export const isAuthorizedUser = (
	userId: number | undefined,
	config: Pick<BridgeConfig, 'allowedUserIds'>
): boolean => userId !== undefined && config.allowedUserIds.includes(userId)

/**
 * First middleware of the bot: updates from senders outside the allow-list
 * stop here. Message senders get a fixed rejection reply.
 */
export const createAuthGuard = (
	config: Pick<BridgeConfig, 'allowedUserIds'>
): MiddlewareFn<Context> => async (ctx, next) => {
	const userId = ctx.from?.id
	if (isAuthorizedUser(userId, config)) {
		await next()
		return
	}

	void logEvent('warn', 'Unauthorized access', { userId, chatId: ctx.chat?.id })
	if (ctx.message) {
		await ctx.reply(UNAUTHORIZED_REPLY)
	}
}

import { Bot, GrammyError, HttpError } from 'grammy';
import type { BotError, Context } from 'grammy';
import type { ConversationEngine } from './conversation/machine';
import type { ConversationEvent } from './conversation/session';
import { errorMessage, logError, logWarn } from './utils/logger';

const COMMANDS = ['start', 'menu', 'cancel'] as const;

const isTooOldCallbackError = (error: unknown): error is GrammyError =>
  error instanceof GrammyError &&
  error.error_code === 400 &&
  error.description.toLowerCase().includes('query is too old');

const generateTraceId = (): string => `tr-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 6)}`;

const safeAnswerCallback = async (ctx: Context): Promise<void> => {
  try {
    await ctx.answerCallbackQuery();
  } catch (error) {
    if (isTooOldCallbackError(error)) {
      logWarn('Callback query too old', { scope: 'telegram', event: 'callback_query_too_old', callbackQueryId: ctx.callbackQuery?.id, chatId: ctx.chat?.id });
      return;
    }
    throw error;
  }
};

const describeBotError = (err: BotError<Context>): Record<string, unknown> => {
  const { error } = err;
  if (error instanceof GrammyError) return { kind: 'grammy', code: error.error_code, description: error.description };
  if (error instanceof HttpError) return { kind: 'http', error: errorMessage(error.error) };
  return { kind: 'unknown', error: errorMessage(error) };
};

export const createBot = (token: string): Bot => new Bot(token);

/** Routes commands, button presses and plain text into the conversation engine. */
export function registerConversation(bot: Bot, engine: ConversationEngine): void {
  const dispatch = async (ctx: Context, event: ConversationEvent): Promise<void> => {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return;
    await engine.handle(chatId, event);
  };

  bot.use(async (ctx, next) => {
    const traceId = generateTraceId();
    try {
      await next();
    } catch (error) {
      logError('Update handling failed', { scope: 'bot', event: 'update_error', traceId, updateId: ctx.update.update_id, error: errorMessage(error) });
      try {
        await ctx.reply('An unexpected error occurred. Please try /start again.');
      } catch (replyError) {
        logWarn('Error notice not delivered', { scope: 'bot', event: 'error_notice_failed', traceId, error: errorMessage(replyError) });
      }
    }
  });

  for (const command of COMMANDS) {
    bot.command(command, async (ctx) => {
      await dispatch(ctx, { kind: 'command', command });
    });
  }

  bot.on('callback_query:data', async (ctx) => {
    await safeAnswerCallback(ctx);
    await dispatch(ctx, { kind: 'selection', token: ctx.callbackQuery.data });
  });

  bot.on('message:text', async (ctx) => {
    // Unknown commands are not conversation input.
    if (ctx.message.text.startsWith('/')) return;
    await dispatch(ctx, { kind: 'text', text: ctx.message.text });
  });

  bot.catch((err) => {
    logError('Unhandled bot error', { scope: 'bot', event: 'bot_error', updateId: err.ctx.update.update_id, ...describeBotError(err) });
  });
}

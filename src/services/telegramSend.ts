import { GrammyError, InlineKeyboard, type Api } from 'grammy';
import { clampMessage } from '../ui/text';
import { logWarn } from '../utils/logger';
import type { ButtonRows, MessagingGateway } from './gateway';

type RateLimitError = {
  kind: 'rate_limit';
  retryAfterSeconds: number;
};

type TelegramError = {
  kind: 'telegram_error';
  message: string;
  code?: number;
};

export type TelegramSendFailure = RateLimitError | TelegramError;

const parseRetryAfterSeconds = (error: GrammyError): number | null => {
  const retryAfter = error.parameters?.retry_after;
  if (typeof retryAfter === 'number' && Number.isFinite(retryAfter) && retryAfter > 0) {
    return retryAfter;
  }

  const match = error.description.match(/retry after (\d+)/i);
  if (match) {
    const seconds = Number(match[1]);
    if (Number.isFinite(seconds) && seconds > 0) {
      return seconds;
    }
  }

  return null;
};

export const parseTelegramError = (error: unknown): TelegramSendFailure => {
  if (error instanceof GrammyError) {
    if (error.error_code === 429) {
      const retryAfterSeconds = parseRetryAfterSeconds(error) ?? 30;
      return { kind: 'rate_limit', retryAfterSeconds };
    }

    return {
      kind: 'telegram_error',
      message: error.description || error.message,
      code: error.error_code
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'telegram_error', message };
};

export const buildInlineKeyboard = (rows: ButtonRows): InlineKeyboard => {
  const kb = new InlineKeyboard();
  rows.forEach((row, index) => {
    row.forEach((button) => kb.text(button.label, button.action));
    if (index < rows.length - 1) kb.row();
  });
  return kb;
};

export function createTelegramGateway(api: Api): MessagingGateway {
  return {
    async send(chatId, text, options) {
      const buttons = options?.buttons;
      const replyMarkup = buttons && buttons.length > 0 ? { reply_markup: buildInlineKeyboard(buttons) } : {};
      try {
        await api.sendMessage(chatId, clampMessage(text), replyMarkup);
      } catch (error) {
        logWarn('Telegram send failed', { scope: 'telegram', event: 'send_failed', chatId, failure: parseTelegramError(error) });
        throw error;
      }
    }
  };
}

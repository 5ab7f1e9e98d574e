import Fastify from 'fastify';
import { webhookCallback } from 'grammy';
import { createBot, registerConversation } from './bot';
import { config } from './config';
import { ConversationEngine } from './conversation/machine';
import { getSupabaseClient } from './db';
import { createMentionDirectory } from './services/mentionTargets';
import { ReminderService } from './services/reminderService';
import { createReminderStore } from './services/reminders';
import { createTelegramGateway } from './services/telegramSend';
import { errorMessage, logError, logInfo } from './utils/logger';

const server = Fastify({ logger: true });
const bot = createBot(config.telegram.botToken);
const supabase = getSupabaseClient();
const gateway = createTelegramGateway(bot.api);

const reminders = new ReminderService({
  store: createReminderStore(supabase),
  gateway,
  timezone: config.defaultTimezone
});

const engine = new ConversationEngine(
  { reminders, mentions: createMentionDirectory(supabase), timezone: config.defaultTimezone },
  gateway
);

registerConversation(bot, engine);

server.get('/health', async () => {
  return { status: 'ok', armed: reminders.scheduler.size };
});

server.post('/webhook', webhookCallback(bot, 'fastify'));

const shutdown = async (signal: string): Promise<void> => {
  logInfo('Shutting down', { scope: 'app', event: 'shutdown', signal });
  reminders.stop();
  if (bot.isRunning()) await bot.stop();
  await server.close();
  process.exit(0);
};

const start = async () => {
  try {
    // Timers must be armed before any update can mutate the store.
    await reminders.recover();

    await server.listen({ host: config.server.host, port: config.server.port });
    server.log.info(`Server listening on ${config.server.host}:${config.server.port}`);

    if (config.telegram.devPolling) {
      server.log.info('Running in DEV_POLLING mode: starting bot via long polling.');
      await bot.api.deleteWebhook();
      void bot.start({ drop_pending_updates: false }).catch((error: unknown) => {
        logError('Polling stopped', { scope: 'app', event: 'polling_error', error: errorMessage(error) });
        process.exit(1);
      });
    } else {
      if (config.telegram.webhookUrl) {
        try {
          await bot.api.setWebhook(config.telegram.webhookUrl);
          server.log.info('Webhook registered with Telegram.');
        } catch (error) {
          server.log.error({ err: error }, 'Failed to set Telegram webhook.');
        }
      }

      server.log.info('Running in WEBHOOK mode: NOT calling bot.start(), updates come via /webhook.');
    }
  } catch (error) {
    server.log.error({ err: error }, 'Failed to start application.');
    process.exit(1);
  }
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logError('Shutdown failed', { scope: 'app', event: 'shutdown_error', error: errorMessage(error) });
      process.exit(1);
    });
  });
}

void start();

import { Bot } from '@maxhub/max-bot-api';
import { SqliteDatabase } from './db/sqlite';
import { errorMessage } from './errors';
import { ADMIN_COMMANDS } from './commands/admin';
import { Moderation, createModeration } from './moderation';
import { createRepositories, Repositories } from './repos';
import { IdentifierMasker } from './services/identifier-masker';
import { BotLogger } from './services/logger';
import { MaxChatTransport } from './transport/max-transport';
import { BotConfig } from './types';

export interface Runtime {
  bot: Bot;
  db: SqliteDatabase;
  repos: Repositories;
  logger: BotLogger;
  moderation: Moderation;
}

export async function createRuntime(config: BotConfig): Promise<Runtime> {
  const db = new SqliteDatabase(config.databasePath);
  const repos = createRepositories(db.db);

  const bot = new Bot(config.botToken);
  const transport = new MaxChatTransport(bot.api, repos.restrictions);

  const logChatId = config.logChatId;
  const logger = new BotLogger(
    new IdentifierMasker(config.dataHashSalt),
    logChatId === undefined
      ? undefined
      : (text) => transport.sendMessage({ chatId: logChatId }, text, { notify: false }),
  );

  const moderation = createModeration(repos, transport, logger, config);

  bot.catch(async (error, ctx) => {
    await logger.error('Unhandled bot middleware error', {
      updateType: ctx.updateType,
      error: errorMessage(error),
    });

    throw error;
  });

  bot.on('message_created', async (ctx) => {
    if (await moderation.adminCommands.tryHandle(ctx)) {
      return;
    }

    await moderation.engine.handleMessage(ctx);
  });

  bot.on('user_added', async (ctx) => {
    await moderation.engine.handleUserAdded(ctx);
  });

  bot.on('message_callback', async (ctx) => {
    await moderation.engine.handleCallback(ctx);
  });

  try {
    await bot.api.setMyCommands(ADMIN_COMMANDS.map((command) => ({ ...command })));
  } catch (error) {
    await logger.warn('Failed to set bot commands', {
      error: errorMessage(error),
    });
  }

  return {
    bot,
    db,
    repos,
    logger,
    moderation,
  };
}

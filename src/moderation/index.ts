import { AdminCommands } from '../commands/admin';
import { PolicyStore } from '../policy/policy-store';
import { SettingsCache } from '../policy/settings-cache';
import { Repositories } from '../repos';
import { AdminResolver } from '../services/admin-resolver';
import { AuditLogger } from '../services/audit-logger';
import { CleanupService } from '../services/cleanup';
import { InMemoryIdempotencyGuard } from '../services/idempotency';
import { BotLogger } from '../services/logger';
import { Sleep, WelcomeService } from '../services/welcome';
import { ChatTransport } from '../transport/chat-transport';
import { BotConfig } from '../types';
import { RandomSource } from './challenge-generator';
import { ChallengeManager } from './challenge-manager';
import { ContentFilter } from './content-filter';
import { EnforcementService } from './enforcement';
import { FloodDetector } from './flood-detector';
import { NewbieLinkGate } from './link-gate';
import { ModerationController } from './moderation-controller';
import { ModerationEngine } from './moderation-engine';
import { WarnTracker } from './warn-tracker';

export type ModerationConfig = Pick<
  BotConfig,
  'timezone' | 'logChatId' | 'superadminId' | 'noticeInChat' | 'adminCacheTtlSec'
>;

export interface ModerationOptions {
  random?: RandomSource;
  sleep?: Sleep;
}

export interface Moderation {
  store: PolicyStore;
  settings: SettingsCache;
  audit: AuditLogger;
  challenges: ChallengeManager;
  controller: ModerationController;
  enforcement: EnforcementService;
  engine: ModerationEngine;
  adminCommands: AdminCommands;
  adminResolver: AdminResolver;
  cleanup: CleanupService;
}

export function createModeration(
  repos: Repositories,
  transport: ChatTransport,
  logger: BotLogger,
  config: ModerationConfig,
  options: ModerationOptions = {},
): Moderation {
  const store = new PolicyStore(repos.policySettings, logger);
  const settings = new SettingsCache(store);

  const audit = new AuditLogger(
    repos.moderationActions,
    logger,
    transport,
    (chatId) => settings.get(chatId).auditSinkChatId ?? config.logChatId ?? null,
    config.timezone,
  );

  const floodDetector = new FloodDetector(repos.floodWindows);
  const challenges = new ChallengeManager(repos.challenges, transport, audit, logger, { random: options.random });
  const welcome = new WelcomeService(transport, repos.welcomeMarks, repos.botMessageDeletes, logger, options.sleep);

  const controller = new ModerationController({
    store,
    settings,
    contentFilter: new ContentFilter(store),
    floodDetector,
    linkGate: new NewbieLinkGate(repos.joinRecords, logger),
    warnTracker: new WarnTracker(repos.warnings),
    challenges,
    welcome,
    audit,
    logger,
  });

  const enforcement = new EnforcementService(
    transport,
    controller,
    floodDetector,
    repos.restrictions,
    repos.botMessageDeletes,
    audit,
    logger,
    { noticeInChat: config.noticeInChat, timezone: config.timezone },
  );

  const adminResolver = new AdminResolver(
    transport,
    config.adminCacheTtlSec * 1_000,
    config.superadminId,
    (message, meta) => {
      void logger.warn(message, meta);
    },
  );

  const engine = new ModerationEngine(
    controller,
    enforcement,
    adminResolver,
    new InMemoryIdempotencyGuard(),
    repos,
    transport,
    logger,
  );

  const adminCommands = new AdminCommands(controller, enforcement, adminResolver, transport, logger, {
    timezone: config.timezone,
  });

  return {
    store,
    settings,
    audit,
    challenges,
    controller,
    enforcement,
    engine,
    adminCommands,
    adminResolver,
    cleanup: new CleanupService(repos, transport, logger),
  };
}

import { BetterSqliteDb } from '../db/sqlite';
import { BotMessageDeletesRepo } from './bot-message-deletes-repo';
import { ChallengesRepo } from './challenges-repo';
import { FloodWindowsRepo } from './flood-windows-repo';
import { JoinRecordsRepo } from './join-records-repo';
import { ModerationActionsRepo } from './moderation-actions-repo';
import { PolicySettingsRepo } from './policy-settings-repo';
import { ProcessedMessagesRepo } from './processed-messages-repo';
import { RestrictionsRepo } from './restrictions-repo';
import { WarningsRepo } from './warnings-repo';
import { WelcomeMarksRepo } from './welcome-marks-repo';

export interface Repositories {
  botMessageDeletes: BotMessageDeletesRepo;
  challenges: ChallengesRepo;
  floodWindows: FloodWindowsRepo;
  joinRecords: JoinRecordsRepo;
  moderationActions: ModerationActionsRepo;
  policySettings: PolicySettingsRepo;
  processedMessages: ProcessedMessagesRepo;
  restrictions: RestrictionsRepo;
  warnings: WarningsRepo;
  welcomeMarks: WelcomeMarksRepo;
}

export function createRepositories(db: BetterSqliteDb): Repositories {
  return {
    botMessageDeletes: new BotMessageDeletesRepo(db),
    challenges: new ChallengesRepo(db),
    floodWindows: new FloodWindowsRepo(db),
    joinRecords: new JoinRecordsRepo(db),
    moderationActions: new ModerationActionsRepo(db),
    policySettings: new PolicySettingsRepo(db),
    processedMessages: new ProcessedMessagesRepo(db),
    restrictions: new RestrictionsRepo(db),
    warnings: new WarningsRepo(db),
    welcomeMarks: new WelcomeMarksRepo(db),
  };
}

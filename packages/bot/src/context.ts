import type { Guild } from 'discord.js';
import type { Logger } from '@safeguard/shared';
import type { GuildPort, ReviewerRegistry, ReviewWorkflow } from '@safeguard/minor-review';
import type { BotConfig } from './config.js';

/** Everything interaction handlers need, built once in main(). */
export interface BotContext {
  config: BotConfig;
  workflow: ReviewWorkflow;
  reviewers: ReviewerRegistry;
  logger: Logger;
  portFor(guild: Guild): GuildPort;
}

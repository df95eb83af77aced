#!/usr/bin/env node

import { Client, Events, GatewayIntentBits, type Guild } from 'discord.js';
import { createDb, createPool } from '@safeguard/db';
import { createLogger } from '@safeguard/shared';
import {
  ConsentVerifier,
  DrizzleAccountLinks,
  DrizzleReportStore,
  DrizzleReviewerStore,
  ReviewerRegistry,
  ReviewWorkflow,
  type GuildPort,
} from '@safeguard/minor-review';
import { loadConfig } from './config.js';
import type { BotContext } from './context.js';
import { DiscordGuildPort } from './discord/guild-port.js';
import { buildHealthServer } from './health.js';
import { routeInteraction } from './interactions/router.js';
import { DrizzleModerationRepository } from './moderation/repository.js';
import { ModerationService } from './moderation/service.js';
import { ScheduledTasks } from './scheduled-tasks.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  logger.info('Safeguard bot starting...');

  const pool = createPool(config.databaseUrl);
  const db = createDb(pool);

  const reports = new DrizzleReportStore(db);
  const reviewers = new ReviewerRegistry(new DrizzleReviewerStore(db), undefined, logger.child('reviewers'));
  const moderation = new ModerationService(new DrizzleModerationRepository(db), logger);

  const workflow = new ReviewWorkflow({
    reports,
    reviewers,
    consent: new ConsentVerifier(
      { checkUrl: config.consent.checkUrl, secret: config.consent.secret },
      logger.child('consent'),
    ),
    accounts: new DrizzleAccountLinks(db),
    bans: moderation,
    notes: moderation,
    settings: {
      verifiedRoleId: config.roles.verified,
      minorRoleId: config.roles.verifiedMinor,
      reviewChannelId: config.channels.minorReview,
      profileBaseUrl: config.profileBaseUrl,
    },
    logger,
  });

  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers],
  });

  const portFor = (guild: Guild): GuildPort => new DiscordGuildPort(guild);
  const managedGuilds = (): GuildPort[] =>
    [...client.guilds.cache.values()]
      .filter(guild => config.discord.guildIds.length === 0 || config.discord.guildIds.includes(guild.id))
      .map(portFor);

  const tasks = new ScheduledTasks({
    guilds: managedGuilds,
    moderation,
    reports,
    minorRoleId: config.roles.verifiedMinor,
    mutedRoleId: config.roles.muted,
    logger,
  });

  const ctx: BotContext = { config, workflow, reviewers, logger, portFor };

  client.once(Events.ClientReady, ready => {
    logger.info(`Logged in as ${ready.user.tag}; serving ${ready.guilds.cache.size} guild(s)`);
    tasks.start();
  });

  client.on(Events.InteractionCreate, interaction => {
    void routeInteraction(interaction, ctx);
  });

  client.on(Events.GuildMemberAdd, member => {
    void tasks.onMemberJoin(portFor(member.guild), member.id);
  });

  const health = config.healthPort === null
    ? null
    : buildHealthServer({ isReady: () => client.isReady(), lastSweep: () => tasks.lastSweep });

  const stop = async () => {
    tasks.stop();
    await health?.close();
    await client.destroy();
    await pool.end();
  };

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (err) => {
    logger.error('Uncaught exception:', err);
    void stop().finally(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection:', reason);
  });

  if (health && config.healthPort !== null) {
    await health.listen({ port: config.healthPort, host: '0.0.0.0' });
    logger.info(`Health endpoint on http://0.0.0.0:${config.healthPort}/health`);
  }

  await client.login(config.discord.token);
}

main().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : err);
  process.exit(1);
});

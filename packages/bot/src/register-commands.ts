#!/usr/bin/env node

import { REST, Routes } from 'discord.js';
import { createLogger } from '@safeguard/shared';
import { commandDefinitions } from './commands/index.js';
import { loadConfig } from './config.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel).child('register');

  if (config.discord.guildIds.length === 0) {
    throw new Error('GUILD_IDS is empty; nothing to register commands in.');
  }

  const rest = new REST({ version: '10' }).setToken(config.discord.token);
  const body = commandDefinitions();

  for (const guildId of config.discord.guildIds) {
    await rest.put(Routes.applicationGuildCommands(config.discord.clientId, guildId), { body });
    logger.info(`Registered ${body.length} command(s) in guild ${guildId}`);
  }
}

main().catch((err) => {
  console.error('Command registration failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});

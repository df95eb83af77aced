import type { Interaction, RepliableInteraction } from 'discord.js';
import { isAppError } from '@safeguard/shared';
import { commands } from '../commands/index.js';
import type { BotContext } from '../context.js';
import {
  handleReportButton,
  handleReportModal,
  isMinorReportButton,
  parseModalCustomId,
} from './minor-report.js';

const INTERNAL_ERROR_REPLY = 'Something went wrong while handling that. The error has been logged.';

async function replyWithError(interaction: RepliableInteraction, content: string, ctx: BotContext): Promise<void> {
  try {
    if (interaction.deferred || interaction.replied) {
      await interaction.editReply(content);
    } else {
      await interaction.reply({ content, ephemeral: true });
    }
  } catch (err) {
    ctx.logger.warn('Could not send error reply:', err);
  }
}

/** Single entry point for slash commands, report buttons and report modals. */
export async function routeInteraction(interaction: Interaction, ctx: BotContext): Promise<void> {
  try {
    if (interaction.isChatInputCommand()) {
      const command = commands.get(interaction.commandName);
      if (!command) {
        await interaction.reply({ content: 'Unknown command.', ephemeral: true });
        return;
      }
      await command.execute(interaction, ctx);
    } else if (interaction.isButton()) {
      if (isMinorReportButton(interaction.customId)) {
        await handleReportButton(interaction, ctx);
      }
    } else if (interaction.isModalSubmit()) {
      if (parseModalCustomId(interaction.customId)) {
        await handleReportModal(interaction, ctx);
      }
    }
  } catch (err) {
    if (!interaction.isRepliable()) {
      ctx.logger.error('Interaction failed:', err);
      return;
    }
    if (isAppError(err)) {
      await replyWithError(interaction, err.message, ctx);
      return;
    }
    ctx.logger.error(`Interaction ${interaction.id} failed:`, err);
    await replyWithError(interaction, INTERNAL_ERROR_REPLY, ctx);
  }
}

import {
  ActionRowBuilder,
  ModalBuilder,
  TextInputBuilder,
  TextInputStyle,
  type ButtonInteraction,
  type ModalSubmitInteraction,
} from 'discord.js';
import { Errors } from '@safeguard/shared';
import type { CardAction } from '@safeguard/minor-review';
import type { BotContext } from '../context.js';
import { MINOR_REPORT_BUTTONS } from '../discord/render.js';

export const DURATION_INPUT = 'duration';
export const REASON_INPUT = 'reason';

export type ModalAction = 'approve' | 'deny';

const MODAL_ID = /^minor_report_(approve|deny)_modal:(\d+)$/;

export function modalCustomId(action: ModalAction, messageId: string): string {
  return `minor_report_${action}_modal:${messageId}`;
}

/** The card message id travels in the modal's custom id; buttons have no other state. */
export function parseModalCustomId(customId: string): { action: ModalAction; messageId: string } | null {
  const match = MODAL_ID.exec(customId);
  if (!match) return null;
  const action = match[1] === 'approve' ? 'approve' : 'deny';
  return { action, messageId: match[2] };
}

export function isMinorReportButton(customId: string): boolean {
  return Object.values<string>(MINOR_REPORT_BUTTONS).includes(customId);
}

function approveModal(messageId: string, defaultDuration: string): ModalBuilder {
  return new ModalBuilder()
    .setCustomId(modalCustomId('approve', messageId))
    .setTitle('Approve Minor Report')
    .addComponents(
      new ActionRowBuilder<TextInputBuilder>().addComponents(
        new TextInputBuilder()
          .setCustomId(DURATION_INPUT)
          .setLabel('Ban duration (e.g. 3y, 30d, 12h)')
          .setStyle(TextInputStyle.Short)
          .setRequired(true)
          .setMaxLength(32)
          .setValue(defaultDuration),
      ),
    );
}

function denyModal(messageId: string): ModalBuilder {
  return new ModalBuilder()
    .setCustomId(modalCustomId('deny', messageId))
    .setTitle('Deny Minor Report')
    .addComponents(
      new ActionRowBuilder<TextInputBuilder>().addComponents(
        new TextInputBuilder()
          .setCustomId(REASON_INPUT)
          .setLabel('Reason for denial')
          .setStyle(TextInputStyle.Paragraph)
          .setRequired(false)
          .setMaxLength(1000),
      ),
    );
}

export async function handleReportButton(interaction: ButtonInteraction, ctx: BotContext): Promise<void> {
  if (!interaction.inCachedGuild()) {
    await interaction.reply({ content: Errors.GUILD_ONLY().message, ephemeral: true });
    return;
  }

  const action: CardAction = {
    guild: ctx.portFor(interaction.guild),
    actorId: interaction.user.id,
    messageId: interaction.message.id,
  };

  switch (interaction.customId) {
    case MINOR_REPORT_BUTTONS.APPROVE: {
      const prompt = await ctx.workflow.openApprove(action);
      if (!prompt.ok) {
        await interaction.reply({ content: prompt.message, ephemeral: true });
        return;
      }
      await interaction.showModal(approveModal(action.messageId, prompt.defaultValue));
      return;
    }
    case MINOR_REPORT_BUTTONS.DENY: {
      const prompt = await ctx.workflow.openDeny(action);
      if (!prompt.ok) {
        await interaction.reply({ content: prompt.message, ephemeral: true });
        return;
      }
      await interaction.showModal(denyModal(action.messageId));
      return;
    }
    case MINOR_REPORT_BUTTONS.RECHECK: {
      await interaction.deferReply({ ephemeral: true });
      const outcome = await ctx.workflow.recheck(action);
      await interaction.editReply(outcome.message);
      return;
    }
  }
}

export async function handleReportModal(interaction: ModalSubmitInteraction, ctx: BotContext): Promise<void> {
  const parsed = parseModalCustomId(interaction.customId);
  if (!parsed) return;

  if (!interaction.inCachedGuild()) {
    await interaction.reply({ content: Errors.GUILD_ONLY().message, ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const action: CardAction = {
    guild: ctx.portFor(interaction.guild),
    actorId: interaction.user.id,
    messageId: parsed.messageId,
  };

  const outcome = parsed.action === 'approve'
    ? await ctx.workflow.approve({ ...action, duration: interaction.fields.getTextInputValue(DURATION_INPUT) })
    : await ctx.workflow.deny({ ...action, reason: interaction.fields.getTextInputValue(REASON_INPUT) });

  await interaction.editReply(outcome.message);
}

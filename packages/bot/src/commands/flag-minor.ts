import { SlashCommandBuilder, type ChatInputCommandInteraction } from 'discord.js';
import { Errors, MINOR_REVIEW } from '@safeguard/shared';
import type { BotContext } from '../context.js';
import { hasAnyRole } from './permissions.js';

export const data = new SlashCommandBuilder()
  .setName('flag_minor')
  .setDescription('Flag a verified member as a suspected minor for reviewer sign-off.')
  .addUserOption(opt =>
    opt.setName('user').setDescription('Member to flag').setRequired(true),
  )
  .addIntegerOption(opt =>
    opt
      .setName('suspected_age')
      .setDescription(`Suspected age (${MINOR_REVIEW.MIN_SUSPECTED_AGE}-${MINOR_REVIEW.MAX_SUSPECTED_AGE})`)
      .setRequired(true)
      .setMinValue(MINOR_REVIEW.MIN_SUSPECTED_AGE)
      .setMaxValue(MINOR_REVIEW.MAX_SUSPECTED_AGE),
  )
  .addStringOption(opt =>
    opt
      .setName('evidence')
      .setDescription('What suggests this member is a minor')
      .setRequired(true)
      .setMaxLength(1024),
  );

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void> {
  if (!interaction.inCachedGuild()) {
    await interaction.reply({ content: Errors.GUILD_ONLY().message, ephemeral: true });
    return;
  }

  const allowed = [...ctx.config.roles.admins, ...ctx.config.roles.moderators];
  if (!hasAnyRole(interaction.member.roles.cache, allowed)) {
    await interaction.reply({ content: Errors.MISSING_ROLE().message, ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const outcome = await ctx.workflow.flag({
    guild: ctx.portFor(interaction.guild),
    actorId: interaction.user.id,
    targetId: interaction.options.getUser('user', true).id,
    suspectedAge: interaction.options.getInteger('suspected_age', true),
    evidence: interaction.options.getString('evidence', true),
  });

  await interaction.editReply(outcome.message);
}

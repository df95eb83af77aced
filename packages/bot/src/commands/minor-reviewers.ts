import { SlashCommandBuilder, type ChatInputCommandInteraction } from 'discord.js';
import { Errors } from '@safeguard/shared';
import type { ReviewerChange } from '@safeguard/minor-review';
import type { BotContext } from '../context.js';
import { hasAnyRole } from './permissions.js';

export const data = new SlashCommandBuilder()
  .setName('minor_reviewers')
  .setDescription('Manage who can approve or deny minor reports.')
  .addSubcommand(sub =>
    sub
      .setName('add')
      .setDescription('Add a minor report reviewer.')
      .addUserOption(opt => opt.setName('user').setDescription('Reviewer to add').setRequired(true)),
  )
  .addSubcommand(sub =>
    sub
      .setName('remove')
      .setDescription('Remove a minor report reviewer.')
      .addUserOption(opt => opt.setName('user').setDescription('Reviewer to remove').setRequired(true)),
  )
  .addSubcommand(sub => sub.setName('list').setDescription('List current minor report reviewers.'))
  .addSubcommand(sub =>
    sub.setName('seed').setDescription('Seed initial reviewers (only if list is empty). One-time setup.'),
  );

export function formatReviewerList(ids: readonly string[]): string {
  if (ids.length === 0) {
    return 'There are no minor report reviewers configured. Add some with `/minor_reviewers add`.';
  }
  return '**Minor report reviewers:**\n' + ids.map(id => `<@${id}> (${id})`).join('\n');
}

export function describeAdd(userId: string, change: ReviewerChange): string {
  return change.ok
    ? `Added <@${userId}> as a minor report reviewer.`
    : `<@${userId}> is already a minor report reviewer.`;
}

export function describeRemove(userId: string, change: ReviewerChange): string {
  return change.ok
    ? `Removed <@${userId}> from minor report reviewers.`
    : `<@${userId}> is not in the minor report reviewer list.`;
}

export function describeSeed(change: ReviewerChange): string {
  if (change.ok) {
    return `Seeded ${change.count} initial reviewer(s). Use \`/minor_reviewers list\` to see them.`;
  }
  return change.reason === 'no_defaults'
    ? 'No default reviewers configured.'
    : 'Reviewers already configured. Use add/remove to change.';
}

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void> {
  if (!interaction.inCachedGuild()) {
    await interaction.reply({ content: Errors.GUILD_ONLY().message, ephemeral: true });
    return;
  }
  if (!hasAnyRole(interaction.member.roles.cache, ctx.config.roles.admins)) {
    await interaction.reply({ content: Errors.MISSING_ROLE().message, ephemeral: true });
    return;
  }

  const { reviewers } = ctx;
  let content: string;

  switch (interaction.options.getSubcommand(true)) {
    case 'add': {
      const user = interaction.options.getUser('user', true);
      content = describeAdd(user.id, await reviewers.add(user.id, interaction.user.id));
      break;
    }
    case 'remove': {
      const user = interaction.options.getUser('user', true);
      content = describeRemove(user.id, await reviewers.remove(user.id));
      break;
    }
    case 'list':
      content = formatReviewerList(await reviewers.listReviewerIds());
      break;
    case 'seed':
      content = describeSeed(await reviewers.seed(ctx.config.defaultReviewerIds, interaction.user.id));
      break;
    default:
      content = 'Unknown subcommand.';
  }

  await interaction.reply({ content, ephemeral: true });
}

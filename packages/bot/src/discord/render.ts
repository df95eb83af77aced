import { ActionRowBuilder, ButtonBuilder, ButtonStyle, EmbedBuilder } from 'discord.js';
import type { ReportCard } from '@safeguard/minor-review';

export const MINOR_REPORT_BUTTONS = {
  APPROVE: 'minor_report_approve',
  DENY: 'minor_report_deny',
  RECHECK: 'minor_report_recheck',
} as const;

export interface RenderedCard {
  embeds: EmbedBuilder[];
  components: ActionRowBuilder<ButtonBuilder>[];
}

export function buildReportEmbed(card: ReportCard): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(card.title)
    .setColor(card.color)
    .addFields(card.fields)
    .setFooter({ text: card.footer });
  if (card.thumbnailUrl) {
    embed.setThumbnail(card.thumbnailUrl);
  }
  return embed;
}

export function buildReportButtons(): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(MINOR_REPORT_BUTTONS.APPROVE)
      .setLabel('Approve Ban')
      .setStyle(ButtonStyle.Success),
    new ButtonBuilder()
      .setCustomId(MINOR_REPORT_BUTTONS.DENY)
      .setLabel('Deny Report')
      .setStyle(ButtonStyle.Danger),
    new ButtonBuilder()
      .setCustomId(MINOR_REPORT_BUTTONS.RECHECK)
      .setLabel('Recheck Consent')
      .setStyle(ButtonStyle.Primary),
  );
}

/** Embed plus, while the report is pending, its action buttons. An empty list clears old buttons on edit. */
export function renderCard(card: ReportCard): RenderedCard {
  return {
    embeds: [buildReportEmbed(card)],
    components: card.showControls ? [buildReportButtons()] : [],
  };
}

import type { ChatInputCommandInteraction, RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import type { BotContext } from '../context.js';
import * as flagMinor from './flag-minor.js';
import * as minorReviewers from './minor-reviewers.js';

export interface SlashCommand {
  data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void>;
}

export const commands: ReadonlyMap<string, SlashCommand> = new Map<string, SlashCommand>(
  [flagMinor, minorReviewers].map((command): [string, SlashCommand] => [command.data.name, command]),
);

export function commandDefinitions(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return [...commands.values()].map(command => command.data.toJSON());
}

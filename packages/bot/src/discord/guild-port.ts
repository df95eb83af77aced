import type { Guild, GuildMember, GuildTextBasedChannel } from 'discord.js';
import { DiscordAPIError } from 'discord.js';
import type { PlatformResult, PlatformValue } from '@safeguard/shared';
import type { GuildPort, MemberView, ReportCard } from '@safeguard/minor-review';
import { toPlatformError } from './errors.js';
import { renderCard } from './render.js';

export function toMemberView(member: GuildMember): MemberView {
  return {
    id: member.id,
    displayName: member.displayName,
    roleIds: new Set(member.roles.cache.keys()),
    avatarUrl: member.displayAvatarURL(),
  };
}

async function attempt(run: () => Promise<unknown>): Promise<PlatformResult> {
  try {
    await run();
    return { ok: true };
  } catch (err) {
    return toPlatformError(err);
  }
}

/** GuildPort over a cached discord.js guild. */
export class DiscordGuildPort implements GuildPort {
  constructor(private readonly guild: Guild) {}

  get id(): string {
    return this.guild.id;
  }

  get name(): string {
    return this.guild.name;
  }

  async fetchMember(userId: string): Promise<MemberView | null> {
    try {
      return toMemberView(await this.guild.members.fetch(userId));
    } catch (err) {
      if (err instanceof DiscordAPIError && toPlatformError(err).reason === 'not_found') {
        return null;
      }
      throw err;
    }
  }

  hasRole(roleId: string): boolean {
    return this.guild.roles.cache.has(roleId);
  }

  hasChannel(channelId: string): boolean {
    return this.textChannel(channelId) !== null;
  }

  addRole(userId: string, roleId: string, reason?: string): Promise<PlatformResult> {
    return attempt(() => this.guild.members.addRole({ user: userId, role: roleId, reason }));
  }

  removeRole(userId: string, roleId: string, reason?: string): Promise<PlatformResult> {
    return attempt(() => this.guild.members.removeRole({ user: userId, role: roleId, reason }));
  }

  ban(userId: string, reason: string): Promise<PlatformResult> {
    return attempt(() => this.guild.bans.create(userId, { reason }));
  }

  unban(userId: string, reason?: string): Promise<PlatformResult> {
    return attempt(() => this.guild.bans.remove(userId, reason));
  }

  sendDirectMessage(userId: string, content: string): Promise<PlatformResult> {
    return attempt(async () => {
      const user = await this.guild.client.users.fetch(userId);
      await user.send(content);
    });
  }

  async postCard(channelId: string, card: ReportCard): Promise<PlatformValue<{ messageId: string }>> {
    const channel = this.textChannel(channelId);
    if (!channel) {
      return { ok: false, reason: 'not_found', error: `Channel ${channelId} is not a text channel in ${this.guild.id}` };
    }
    try {
      const message = await channel.send(renderCard(card));
      return { ok: true, value: { messageId: message.id } };
    } catch (err) {
      return toPlatformError(err);
    }
  }

  editCard(channelId: string, messageId: string, card: ReportCard): Promise<PlatformResult> {
    const channel = this.textChannel(channelId);
    if (!channel) {
      return Promise.resolve({
        ok: false,
        reason: 'not_found',
        error: `Channel ${channelId} is not a text channel in ${this.guild.id}`,
      });
    }
    return attempt(() => channel.messages.edit(messageId, renderCard(card)));
  }

  private textChannel(channelId: string): GuildTextBasedChannel | null {
    const channel = this.guild.channels.cache.get(channelId);
    return channel && channel.isTextBased() ? channel : null;
  }
}

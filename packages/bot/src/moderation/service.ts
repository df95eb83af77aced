import type { BanRecord, Logger, MuteRecord, PlatformError, PlatformResult } from '@safeguard/shared';
import type { BanOrder, BanOutcome, BanService, GuildPort, NoteService } from '@safeguard/minor-review';
import type { ModerationRepository } from './repository.js';

function formatEndDate(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString().replace('T', ' ').slice(0, 19);
}

function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function banFailureMessage(failure: PlatformError): string {
  switch (failure.reason) {
    case 'forbidden':
      return 'I do not have permission to ban this user.';
    case 'not_found':
      return 'User not found.';
    default:
      return `The ban could not be applied: ${failure.error}`;
  }
}

/**
 * Ban, unban, unmute and user-note helpers backed by the moderation tables.
 * Platform failures come back as results; storage errors propagate.
 */
export class ModerationService implements BanService, NoteService {
  private readonly logger: Logger;

  constructor(
    private readonly repo: ModerationRepository,
    logger: Logger,
  ) {
    this.logger = logger.child('moderation');
  }

  async banMemberWithEpoch(order: BanOrder): Promise<BanOutcome> {
    const { guild, userId, unbanEpoch, reason, evidence, authorId, needsApproval } = order;
    const endDate = formatEndDate(unbanEpoch);

    // DM first: once banned the bot may no longer share a server with the user.
    const dm = await guild.sendDirectMessage(
      userId,
      `You have been banned from ${guild.name} until ${endDate} (UTC). `
        + 'To appeal the ban, please reach out to an Administrator.\n'
        + `Following is the reason given:\n>>> ${reason}\n`,
    );
    if (!dm.ok) {
      this.logger.info(`Could not DM ${userId} about their ban: ${dm.reason}`);
    }

    const banned = await guild.ban(userId, reason);
    if (!banned.ok) {
      this.logger.warn(`Failed to ban ${userId} in guild ${guild.id}: ${banned.reason} ${banned.error}`);
      return { ok: false, message: banFailureMessage(banned) };
    }

    let record: BanRecord;
    try {
      record = await this.repo.insertBan({
        userId,
        reason,
        moderatorId: authorId,
        unbanTime: unbanEpoch,
        approved: !needsApproval,
      });
    } catch (err) {
      // Every platform ban needs a record; sweeps and rechecks only lift recorded bans.
      this.logger.error(`Failed to record ban for ${userId}; lifting the platform ban`, err);
      const lifted = await guild.unban(userId, 'Ban could not be recorded');
      if (!lifted.ok) {
        this.logger.error(`Could not lift unrecorded ban for ${userId}: ${lifted.reason} ${lifted.error}`);
        return { ok: false, message: 'The ban could not be recorded and could not be lifted. Unban the user manually.' };
      }
      return { ok: false, message: 'The ban could not be recorded, so it was lifted. The error has been logged.' };
    }
    await this.repo.insertNote({
      userId,
      note: `Banned until ${endDate} (UTC). ${evidence}`,
      moderatorId: authorId,
      date: toDateString(new Date()),
    });
    this.logger.info(`Ban #${record.id} issued for ${userId} until ${endDate} by ${authorId}`);

    return {
      ok: true,
      banId: record.id,
      message: needsApproval
        ? `Ban submitted until ${endDate} (UTC). Awaiting senior moderator approval.`
        : `Member banned until ${endDate} (UTC).`,
    };
  }

  async getActiveBan(userId: string): Promise<BanRecord | null> {
    return this.repo.latestActiveBan(userId);
  }

  /** Lift a platform ban and close its record. A ban that is already gone counts as lifted. */
  async unbanMember(guild: GuildPort, userId: string): Promise<PlatformResult> {
    const result = await guild.unban(userId, 'Ban lifted');
    if (!result.ok && result.reason !== 'not_found') {
      return result;
    }
    await this.repo.markUnbanned(userId);
    this.logger.info(`Unbanned ${userId} in guild ${guild.id}`);
    return { ok: true };
  }

  async unmuteMember(guild: GuildPort, userId: string, mutedRoleId: string): Promise<PlatformResult> {
    const result = await guild.removeRole(userId, mutedRoleId, 'Mute expired');
    if (!result.ok && result.reason !== 'not_found') {
      return result;
    }
    await this.repo.deleteMutes(userId);
    this.logger.info(`Unmuted ${userId} in guild ${guild.id}`);
    return { ok: true };
  }

  listDueBans(untilEpoch: number): Promise<BanRecord[]> {
    return this.repo.listDueBans(untilEpoch);
  }

  listDueMutes(untilEpoch: number): Promise<MuteRecord[]> {
    return this.repo.listDueMutes(untilEpoch);
  }

  async addNote(note: { userId: string; note: string; moderatorId: string; date: Date }): Promise<void> {
    await this.repo.insertNote({ ...note, date: toDateString(note.date) });
  }
}

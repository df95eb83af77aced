import { describe, it, expect, beforeEach } from 'vitest';
import type { BanRecord, MuteRecord } from '@safeguard/shared';
import { FakeGuild, silentLogger } from '@safeguard/minor-review/testing';
import type { ModerationRepository, NewBan, NewNote } from '../moderation/repository.js';
import { ModerationService } from '../moderation/service.js';

class InMemoryModerationRepository implements ModerationRepository {
  readonly bans: BanRecord[] = [];
  readonly mutes: MuteRecord[] = [];
  readonly notes: NewNote[] = [];
  insertError: Error | null = null;

  async insertBan(ban: NewBan): Promise<BanRecord> {
    if (this.insertError) throw this.insertError;
    const record: BanRecord = { id: this.bans.length + 1, unbanned: false, createdAt: new Date(0), ...ban };
    this.bans.push(record);
    return record;
  }

  async latestActiveBan(userId: string): Promise<BanRecord | null> {
    const active = this.bans.filter(b => b.userId === userId && !b.unbanned);
    return active[active.length - 1] ?? null;
  }

  async markUnbanned(userId: string): Promise<void> {
    for (const ban of this.bans) {
      if (ban.userId === userId) ban.unbanned = true;
    }
  }

  async listDueBans(untilEpoch: number): Promise<BanRecord[]> {
    return this.bans.filter(b => !b.unbanned && b.unbanTime <= untilEpoch);
  }

  async listDueMutes(untilEpoch: number): Promise<MuteRecord[]> {
    return this.mutes.filter(m => m.unmuteTime <= untilEpoch);
  }

  async deleteMutes(userId: string): Promise<void> {
    for (let i = this.mutes.length - 1; i >= 0; i--) {
      if (this.mutes[i].userId === userId) this.mutes.splice(i, 1);
    }
  }

  async insertNote(note: NewNote): Promise<void> {
    this.notes.push(note);
  }
}

const TARGET = '400000000000000001';
const MOD = '100000000000000001';
const MUTED = '600000000000000003';
const UNBAN_EPOCH = 1_798_675_200;

describe('ModerationService', () => {
  let repo: InMemoryModerationRepository;
  let guild: FakeGuild;
  let service: ModerationService;

  beforeEach(() => {
    repo = new InMemoryModerationRepository();
    guild = new FakeGuild().addMember(TARGET);
    service = new ModerationService(repo, silentLogger());
  });

  function order(needsApproval: boolean) {
    return {
      guild,
      userId: TARGET,
      unbanEpoch: UNBAN_EPOCH,
      reason: 'Parental consent is missing.',
      evidence: 'Minor report approval',
      authorId: MOD,
      needsApproval,
    };
  }

  it('messages the member before banning and records the ban', async () => {
    const outcome = await service.banMemberWithEpoch(order(true));

    expect(outcome).toEqual({
      ok: true,
      banId: 1,
      message: 'Ban submitted until 2026-12-31 00:00:00 (UTC). Awaiting senior moderator approval.',
    });
    expect(guild.calls).toEqual([`dm:${TARGET}`, `ban:${TARGET}`]);
    expect(guild.directMessages[0].content).toBe(
      'You have been banned from Test Server until 2026-12-31 00:00:00 (UTC). '
        + 'To appeal the ban, please reach out to an Administrator.\n'
        + 'Following is the reason given:\n>>> Parental consent is missing.\n',
    );
    expect(repo.bans[0]).toMatchObject({ userId: TARGET, moderatorId: MOD, unbanTime: UNBAN_EPOCH, approved: false });
    expect(repo.notes).toHaveLength(1);
    expect(repo.notes[0]).toMatchObject({
      userId: TARGET,
      moderatorId: MOD,
      note: 'Banned until 2026-12-31 00:00:00 (UTC). Minor report approval',
    });
  });

  it('marks bans that need no approval as approved', async () => {
    const outcome = await service.banMemberWithEpoch(order(false));

    expect(outcome.message).toBe('Member banned until 2026-12-31 00:00:00 (UTC).');
    expect(repo.bans[0].approved).toBe(true);
  });

  it('records nothing when the platform refuses the ban', async () => {
    guild.banResult = { ok: false, reason: 'forbidden', error: 'Missing Permissions' };

    const outcome = await service.banMemberWithEpoch(order(true));

    expect(outcome).toEqual({ ok: false, message: 'I do not have permission to ban this user.' });
    expect(repo.bans).toEqual([]);
    expect(repo.notes).toEqual([]);
  });

  it('records ban ends past 2038', async () => {
    const outcome = await service.banMemberWithEpoch({ ...order(true), unbanEpoch: 2_273_054_400 });

    expect(outcome).toEqual({
      ok: true,
      banId: 1,
      message: 'Ban submitted until 2042-01-11 12:00:00 (UTC). Awaiting senior moderator approval.',
    });
    expect(repo.bans[0].unbanTime).toBe(2_273_054_400);
  });

  it('lifts the platform ban when the record cannot be written', async () => {
    repo.insertError = new Error('integer out of range');

    const outcome = await service.banMemberWithEpoch(order(true));

    expect(outcome).toEqual({
      ok: false,
      message: 'The ban could not be recorded, so it was lifted. The error has been logged.',
    });
    expect(guild.calls).toEqual([`dm:${TARGET}`, `ban:${TARGET}`, `unban:${TARGET}`]);
    expect(guild.banned.has(TARGET)).toBe(false);
    expect(repo.notes).toEqual([]);
  });

  it('lists unapproved bans that are due', async () => {
    await service.banMemberWithEpoch(order(true));

    expect(await service.listDueBans(UNBAN_EPOCH)).toHaveLength(1);
    expect(await service.listDueBans(UNBAN_EPOCH - 1)).toEqual([]);
  });

  it('lifts a ban and closes its record', async () => {
    await service.banMemberWithEpoch(order(false));

    expect(await service.unbanMember(guild, TARGET)).toEqual({ ok: true });
    expect(await service.getActiveBan(TARGET)).toBeNull();
  });

  it('treats an already-lifted platform ban as lifted', async () => {
    await repo.insertBan({ userId: TARGET, reason: 'r', moderatorId: MOD, unbanTime: 1, approved: true });

    expect(await service.unbanMember(guild, TARGET)).toEqual({ ok: true });
    expect(repo.bans[0].unbanned).toBe(true);
  });

  it('unmutes by removing the role and deleting the mute', async () => {
    guild.addMember(TARGET, [MUTED]);
    repo.mutes.push({ id: 1, userId: TARGET, reason: 'spam', moderatorId: MOD, unmuteTime: 10 });

    expect(await service.unmuteMember(guild, TARGET, MUTED)).toEqual({ ok: true });
    expect(guild.members.get(TARGET)?.roleIds.has(MUTED)).toBe(false);
    expect(repo.mutes).toEqual([]);
  });

  it('keeps the mute when the role cannot be removed', async () => {
    guild.roleResult = { ok: false, reason: 'forbidden', error: 'Missing Permissions' };
    repo.mutes.push({ id: 1, userId: TARGET, reason: 'spam', moderatorId: MOD, unmuteTime: 10 });

    const result = await service.unmuteMember(guild, TARGET, MUTED);

    expect(result.ok).toBe(false);
    expect(repo.mutes).toHaveLength(1);
  });

  it('stores notes with a calendar date', async () => {
    await service.addNote({ userId: TARGET, note: 'hello', moderatorId: MOD, date: new Date('2025-02-03T23:59:00Z') });

    expect(repo.notes).toEqual([{ userId: TARGET, note: 'hello', moderatorId: MOD, date: '2025-02-03' }]);
  });
});

import { describe, it, expect } from 'vitest';
import { expiryInstant } from '../age.js';
import { regrantOnRejoin, sweepExpiredMinorRoles } from '../sweep.js';
import { FakeGuild, InMemoryReportStore, silentLogger } from '../testing/fakes.js';

const MINOR = '600000000000000002';
const USER_A = '400000000000000001';
const USER_B = '400000000000000002';
const CREATED = new Date('2023-06-01T12:00:00Z');
const EXPIRY = expiryInstant(CREATED, 16);
const DAY_MS = 86_400_000;

function guildWith(id: string, members: string[]): FakeGuild {
  const guild = new FakeGuild(id);
  guild.roles.add(MINOR);
  for (const member of members) guild.addMember(member, [MINOR]);
  return guild;
}

describe('sweepExpiredMinorRoles', () => {
  it('removes the role exactly at expiry', async () => {
    const reports = new InMemoryReportStore();
    reports.seed({ userId: USER_A, reportMessageId: '1', status: 'approved', suspectedAge: 16, createdAt: CREATED });
    const guild = guildWith('500000000000000001', [USER_A]);

    const summary = await sweepExpiredMinorRoles([guild], {
      reports,
      minorRoleId: MINOR,
      logger: silentLogger(),
      now: EXPIRY,
    });

    expect(summary).toEqual({ checked: 1, removed: 1, failed: 0 });
    expect(guild.members.get(USER_A)?.roleIds.has(MINOR)).toBe(false);
  });

  it('keeps the role one day before expiry', async () => {
    const reports = new InMemoryReportStore();
    reports.seed({ userId: USER_A, reportMessageId: '1', status: 'consent_verified', suspectedAge: 16, createdAt: CREATED });
    const guild = guildWith('500000000000000001', [USER_A]);

    const summary = await sweepExpiredMinorRoles([guild], {
      reports,
      minorRoleId: MINOR,
      logger: silentLogger(),
      now: new Date(EXPIRY.getTime() - DAY_MS),
    });

    expect(summary).toEqual({ checked: 0, removed: 0, failed: 0 });
    expect(guild.calls).toEqual([]);
  });

  it('ignores pending and denied reports', async () => {
    const reports = new InMemoryReportStore();
    reports.seed({ userId: USER_A, reportMessageId: '1', status: 'pending', suspectedAge: 16, createdAt: CREATED });
    reports.seed({ userId: USER_B, reportMessageId: '2', status: 'denied', suspectedAge: 16, createdAt: CREATED });
    const guild = guildWith('500000000000000001', [USER_A, USER_B]);

    const summary = await sweepExpiredMinorRoles([guild], {
      reports,
      minorRoleId: MINOR,
      logger: silentLogger(),
      now: EXPIRY,
    });

    expect(summary.checked).toBe(0);
    expect(guild.calls).toEqual([]);
  });

  it('keeps going when one guild refuses the removal', async () => {
    const reports = new InMemoryReportStore();
    reports.seed({ userId: USER_A, reportMessageId: '1', status: 'approved', suspectedAge: 16, createdAt: CREATED });
    const broken = guildWith('500000000000000001', [USER_A]);
    broken.roleResult = { ok: false, reason: 'forbidden', error: 'Missing Permissions' };
    const healthy = guildWith('500000000000000002', [USER_A]);

    const summary = await sweepExpiredMinorRoles([broken, healthy], {
      reports,
      minorRoleId: MINOR,
      logger: silentLogger(),
      now: EXPIRY,
    });

    expect(summary).toEqual({ checked: 2, removed: 1, failed: 1 });
    expect(healthy.members.get(USER_A)?.roleIds.has(MINOR)).toBe(false);
  });

  it('skips guilds without the role', async () => {
    const reports = new InMemoryReportStore();
    reports.seed({ userId: USER_A, reportMessageId: '1', status: 'approved', suspectedAge: 16, createdAt: CREATED });
    const guild = new FakeGuild();
    guild.addMember(USER_A, [MINOR]);
    const logger = silentLogger();

    const summary = await sweepExpiredMinorRoles([guild], { reports, minorRoleId: MINOR, logger, now: EXPIRY });

    expect(summary).toEqual({ checked: 0, removed: 0, failed: 0 });
    expect(logger.warn).toHaveBeenCalledWith(
      `Minor role ${MINOR} not found in guild ${guild.id}; skipping.`,
    );
  });

  it('counts a stored age outside 1-17 as a failure', async () => {
    const reports = new InMemoryReportStore();
    reports.seed({ userId: USER_A, reportMessageId: '1', status: 'approved', suspectedAge: 30, createdAt: CREATED });
    reports.seed({ userId: USER_B, reportMessageId: '2', status: 'approved', suspectedAge: 16, createdAt: CREATED });
    const guild = guildWith('500000000000000001', [USER_A, USER_B]);

    const summary = await sweepExpiredMinorRoles([guild], {
      reports,
      minorRoleId: MINOR,
      logger: silentLogger(),
      now: EXPIRY,
    });

    expect(summary).toEqual({ checked: 1, removed: 1, failed: 1 });
  });

  it('does nothing without a configured role', async () => {
    const reports = new InMemoryReportStore();
    const summary = await sweepExpiredMinorRoles([], { reports, minorRoleId: null, logger: silentLogger() });
    expect(summary).toEqual({ checked: 0, removed: 0, failed: 0 });
  });
});

describe('regrantOnRejoin', () => {
  it('restores the role for a consent-verified minor', async () => {
    const reports = new InMemoryReportStore();
    reports.seed({ userId: USER_A, reportMessageId: '1', status: 'consent_verified', suspectedAge: 16, createdAt: CREATED });
    const guild = new FakeGuild();
    guild.roles.add(MINOR);
    guild.addMember(USER_A);

    const granted = await regrantOnRejoin(guild, USER_A, {
      reports,
      minorRoleId: MINOR,
      logger: silentLogger(),
      now: new Date(EXPIRY.getTime() - DAY_MS),
    });

    expect(granted).toBe(true);
    expect(guild.members.get(USER_A)?.roleIds.has(MINOR)).toBe(true);
  });

  it('does not restore an aged-out role', async () => {
    const reports = new InMemoryReportStore();
    reports.seed({ userId: USER_A, reportMessageId: '1', status: 'consent_verified', suspectedAge: 16, createdAt: CREATED });
    const guild = new FakeGuild();
    guild.roles.add(MINOR);
    guild.addMember(USER_A);

    const granted = await regrantOnRejoin(guild, USER_A, {
      reports,
      minorRoleId: MINOR,
      logger: silentLogger(),
      now: EXPIRY,
    });

    expect(granted).toBe(false);
    expect(guild.calls).toEqual([]);
  });

  it('ignores members with only an approved report', async () => {
    const reports = new InMemoryReportStore();
    reports.seed({ userId: USER_A, reportMessageId: '1', status: 'approved', suspectedAge: 16, createdAt: CREATED });
    const guild = new FakeGuild();
    guild.roles.add(MINOR);
    guild.addMember(USER_A);

    expect(await regrantOnRejoin(guild, USER_A, { reports, minorRoleId: MINOR, logger: silentLogger() })).toBe(false);
  });
});

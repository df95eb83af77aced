import type { Logger, MinorReport } from '@safeguard/shared';
import { hasExpired } from './age.js';
import type { GuildPort } from './ports.js';
import { grantMinorRole } from './roles.js';
import type { ReportStore } from './store.js';

export interface SweepDeps {
  reports: ReportStore;
  minorRoleId: string | null;
  logger: Logger;
  now?: Date;
}

export interface SweepSummary {
  checked: number;
  removed: number;
  failed: number;
}

type UnitResult = 'removed' | 'skipped' | 'failed';

async function expireOne(
  guild: GuildPort,
  report: MinorReport,
  roleId: string,
  logger: Logger,
): Promise<UnitResult> {
  const member = await guild.fetchMember(report.userId);
  if (!member || !member.roleIds.has(roleId)) return 'skipped';

  logger.info(`Removing minor role from ${member.displayName} (${member.id}): aged out per report #${report.id}`);
  const result = await guild.removeRole(member.id, roleId, 'Minor review: user has reached 18');
  if (!result.ok) {
    logger.warn(`Failed to remove minor role from ${member.id}: ${result.reason} ${result.error}`);
    return 'failed';
  }
  return 'removed';
}

/**
 * Remove the protective role from members whose approved or consent-verified
 * report says they have turned 18. Each guild/report pair runs independently;
 * one failure never stops the rest of the sweep.
 */
export async function sweepExpiredMinorRoles(guilds: GuildPort[], deps: SweepDeps): Promise<SweepSummary> {
  const { reports, minorRoleId, logger } = deps;
  const now = deps.now ?? new Date();
  const summary: SweepSummary = { checked: 0, removed: 0, failed: 0 };

  if (!minorRoleId) {
    logger.debug('Minor role not configured; skipping minor role sweep.');
    return summary;
  }

  const candidates = await reports.listExpirable();
  const units: Array<{ guild: GuildPort; report: MinorReport }> = [];

  for (const guild of guilds) {
    if (!guild.hasRole(minorRoleId)) {
      logger.warn(`Minor role ${minorRoleId} not found in guild ${guild.id}; skipping.`);
      continue;
    }
    for (const report of candidates) {
      let expired: boolean;
      try {
        expired = hasExpired(report.createdAt, report.suspectedAge, now);
      } catch (err) {
        logger.warn(`Minor report #${report.id} has an unusable age (${report.suspectedAge}):`, err);
        summary.failed++;
        continue;
      }
      if (expired) units.push({ guild, report });
    }
  }

  summary.checked = units.length;
  const results = await Promise.allSettled(
    units.map(({ guild, report }) => expireOne(guild, report, minorRoleId, logger)),
  );

  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      const { guild, report } = units[i];
      logger.warn(`Minor role sweep failed for report #${report.id} in guild ${guild.id}:`, result.reason);
      summary.failed++;
    } else if (result.value === 'removed') {
      summary.removed++;
    } else if (result.value === 'failed') {
      summary.failed++;
    }
  });

  return summary;
}

/**
 * Re-apply the protective role when a consent-verified minor rejoins before
 * aging out. Returns true when the role was granted.
 */
export async function regrantOnRejoin(
  guild: GuildPort,
  userId: string,
  deps: SweepDeps,
): Promise<boolean> {
  const { reports, minorRoleId, logger } = deps;
  if (!minorRoleId) return false;

  const report = await reports.getConsentVerified(userId);
  if (!report) return false;

  const now = deps.now ?? new Date();
  if (hasExpired(report.createdAt, report.suspectedAge, now)) return false;

  const member = await guild.fetchMember(userId);
  if (!member) return false;

  const grant = await grantMinorRole(guild, member, minorRoleId, logger);
  if (grant === 'added') {
    logger.info(`Re-applied minor role to ${userId} on rejoin (report #${report.id})`);
  }
  return grant === 'added';
}

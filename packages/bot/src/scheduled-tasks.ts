import { SCHEDULER, type BanRecord, type Logger, type MuteRecord, type PlatformResult } from '@safeguard/shared';
import {
  regrantOnRejoin,
  sweepExpiredMinorRoles,
  type GuildPort,
  type ReportStore,
  type SweepSummary,
} from '@safeguard/minor-review';
import { scheduleAt } from './schedule.js';

/** The moderation calls the sweeps need; ModerationService provides all of them. */
export interface ModerationSweeps {
  listDueBans(untilEpoch: number): Promise<BanRecord[]>;
  listDueMutes(untilEpoch: number): Promise<MuteRecord[]>;
  unbanMember(guild: GuildPort, userId: string): Promise<PlatformResult>;
  unmuteMember(guild: GuildPort, userId: string, mutedRoleId: string): Promise<PlatformResult>;
}

export interface ScheduledTasksDeps {
  guilds: () => GuildPort[];
  moderation: ModerationSweeps;
  reports: ReportStore;
  minorRoleId: string | null;
  mutedRoleId: string | null;
  logger: Logger;
  intervalMs?: number;
  clock?: () => Date;
}

export interface CycleSummary {
  startedAt: Date;
  durationMs: number;
  unbanned: number;
  unmuted: number;
  minorRoles: SweepSummary;
}

type Unit = { label: string; run: () => Promise<PlatformResult> };

export class ScheduledTasks {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private last: CycleSummary | null = null;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: ScheduledTasksDeps) {
    this.logger = deps.logger.child('scheduler');
    this.clock = deps.clock ?? (() => new Date());
  }

  get lastSweep(): CycleSummary | null {
    return this.last;
  }

  /** Run a cycle now, then every interval. */
  start(): void {
    if (this.timer) return;
    this.logger.info('Starting scheduled tasks');
    void this.tick();
    this.timer = setInterval(() => {
      void this.tick();
    }, this.deps.intervalMs ?? SCHEDULER.INTERVAL_MS);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info('Stopped scheduled tasks');
  }

  /**
   * One unban, unmute and minor-role pass, in that order. Returns null when
   * the previous cycle is still running.
   */
  async runCycle(): Promise<CycleSummary | null> {
    if (this.running) {
      this.logger.warn('Previous cycle still running; skipping this one.');
      return null;
    }
    this.running = true;
    const startedAt = this.clock();
    try {
      const unbanned = await this.autoUnban();
      const unmuted = await this.autoUnmute();
      const minorRoles = await this.autoRemoveMinorRole();
      const summary: CycleSummary = {
        startedAt,
        durationMs: this.clock().getTime() - startedAt.getTime(),
        unbanned,
        unmuted,
        minorRoles,
      };
      this.last = summary;
      this.logger.debug(
        `Cycle complete: ${unbanned} unbanned, ${unmuted} unmuted, `
          + `${minorRoles.removed}/${minorRoles.checked} minor roles removed`,
      );
      return summary;
    } finally {
      this.running = false;
    }
  }

  async autoUnban(): Promise<number> {
    const due = await this.deps.moderation.listDueBans(this.lookaheadEpoch());
    const units = this.deps.guilds().flatMap(guild =>
      due.map(ban => this.scheduled(ban.unbanTime, {
        label: `unban ${ban.userId} in ${guild.id}`,
        run: () => this.deps.moderation.unbanMember(guild, ban.userId),
      })),
    );
    return this.settle(units);
  }

  async autoUnmute(): Promise<number> {
    const { mutedRoleId } = this.deps;
    if (!mutedRoleId) return 0;

    const due = await this.deps.moderation.listDueMutes(this.lookaheadEpoch());
    const units = this.deps.guilds()
      .filter(guild => guild.hasRole(mutedRoleId))
      .flatMap(guild =>
        due.map(mute => this.scheduled(mute.unmuteTime, {
          label: `unmute ${mute.userId} in ${guild.id}`,
          run: () => this.deps.moderation.unmuteMember(guild, mute.userId, mutedRoleId),
        })),
      );
    return this.settle(units);
  }

  autoRemoveMinorRole(): Promise<SweepSummary> {
    return sweepExpiredMinorRoles(this.deps.guilds(), {
      reports: this.deps.reports,
      minorRoleId: this.deps.minorRoleId,
      logger: this.logger,
      now: this.clock(),
    });
  }

  /** Re-apply the minor role to a consent-verified member who rejoined. */
  async onMemberJoin(guild: GuildPort, userId: string): Promise<boolean> {
    try {
      return await regrantOnRejoin(guild, userId, {
        reports: this.deps.reports,
        minorRoleId: this.deps.minorRoleId,
        logger: this.logger,
        now: this.clock(),
      });
    } catch (err) {
      this.logger.error(`Rejoin check failed for ${userId} in guild ${guild.id}:`, err);
      return false;
    }
  }

  private async tick(): Promise<void> {
    try {
      await this.runCycle();
    } catch (err) {
      this.logger.error('Cycle failed:', err);
    }
  }

  private lookaheadEpoch(): number {
    return Math.floor((this.clock().getTime() + SCHEDULER.LOOKAHEAD_MS) / 1000);
  }

  private scheduled(dueEpoch: number, unit: Unit): Unit {
    return {
      label: unit.label,
      run: () => scheduleAt(new Date(dueEpoch * 1000), unit.run, () => this.clock().getTime()),
    };
  }

  private async settle(units: Unit[]): Promise<number> {
    const results = await Promise.allSettled(units.map(unit => unit.run()));
    let succeeded = 0;
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.warn(`Scheduled ${units[i].label} failed:`, result.reason);
      } else if (!result.value.ok) {
        this.logger.warn(`Scheduled ${units[i].label} failed: ${result.value.reason} ${result.value.error}`);
      } else {
        succeeded++;
      }
    });
    return succeeded;
  }
}

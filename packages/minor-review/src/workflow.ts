import {
  Errors,
  isAppError,
  PARENTAL_CONSENT_BAN_REASON,
  type Logger,
  type MinorReport,
} from '@safeguard/shared';
import { isValidSuspectedAge, yearsUntil18 } from './age.js';
import { buildReportCard, discordTimestamp, type CardSubject } from './card.js';
import type { ConsentChecker } from './consent.js';
import { formatYears, parseDuration } from './duration.js';
import type { AccountLinks } from './accounts.js';
import type { BanService, GuildPort, MemberView, NoteService } from './ports.js';
import type { ReviewerRegistry } from './reviewers.js';
import { grantMinorRole, type GrantResult } from './roles.js';
import type { ReportStore } from './store.js';

export interface MinorReviewSettings {
  /** Role a user must hold before they can be flagged. */
  verifiedRoleId: string | null;
  /** Protective role. Absent means flagging is refused. */
  minorRoleId: string | null;
  /** Channel report cards are posted to. Absent means no report can be created. */
  reviewChannelId: string | null;
  /** Prefix for external profile links on cards; absent hides the link. */
  profileBaseUrl: string | null;
}

export interface WorkflowDeps {
  reports: ReportStore;
  reviewers: ReviewerRegistry;
  consent: ConsentChecker;
  accounts: AccountLinks;
  bans: BanService;
  notes: NoteService;
  settings: MinorReviewSettings;
  logger: Logger;
  clock?: () => Date;
}

export type WorkflowOutcome = { ok: boolean; message: string };

export type PromptOutcome =
  | { ok: true; defaultValue: string }
  | { ok: false; message: string };

export interface FlagInput {
  guild: GuildPort;
  actorId: string;
  targetId: string;
  suspectedAge: number;
  evidence: string;
}

export interface CardAction {
  guild: GuildPort;
  actorId: string;
  /** Id of the rendered report card the action was taken on. */
  messageId: string;
}

const GRANT_SUFFIX: Record<GrantResult, string> = {
  added: ' Role assigned.',
  already_assigned: ' Role was already assigned.',
  role_missing: ' The minor role no longer exists on this server.',
  failed: ' The role could not be assigned.',
};

/**
 * Flag, approve, deny and recheck transitions for minor reports. Holds no
 * report state between calls: every action re-reads the report by the card's
 * message id before acting on it. Approve and deny claim the report for the
 * length of the call, and only move it out of `pending` if it is still there.
 */
export class ReviewWorkflow {
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly resolving = new Set<number>();

  constructor(private readonly deps: WorkflowDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger.child('minor-review');
  }

  async flag(input: FlagInput): Promise<WorkflowOutcome> {
    return this.guarded(() => this.runFlag(input));
  }

  async openApprove(action: CardAction): Promise<PromptOutcome> {
    try {
      const report = await this.authorize(action, true);
      return { ok: true, defaultValue: formatYears(yearsUntil18(report.suspectedAge)) };
    } catch (err) {
      if (isAppError(err)) return { ok: false, message: err.message };
      throw err;
    }
  }

  async openDeny(action: CardAction): Promise<PromptOutcome> {
    try {
      await this.authorize(action, true);
      return { ok: true, defaultValue: '' };
    } catch (err) {
      if (isAppError(err)) return { ok: false, message: err.message };
      throw err;
    }
  }

  async approve(action: CardAction & { duration: string }): Promise<WorkflowOutcome> {
    return this.guarded(() => this.runApprove(action));
  }

  async deny(action: CardAction & { reason: string }): Promise<WorkflowOutcome> {
    return this.guarded(() => this.runDeny(action));
  }

  async recheck(action: CardAction): Promise<WorkflowOutcome> {
    return this.guarded(() => this.runRecheck(action));
  }

  private async runFlag(input: FlagInput): Promise<WorkflowOutcome> {
    const { guild, actorId, targetId, suspectedAge } = input;
    const { settings, reports } = this.deps;
    const evidence = input.evidence.trim();

    if (!isValidSuspectedAge(suspectedAge)) throw Errors.INVALID_AGE();
    if (!evidence) throw Errors.EVIDENCE_REQUIRED();

    const { minorRoleId, verifiedRoleId } = settings;
    if (!minorRoleId) {
      return { ok: false, message: 'Minor review is not configured (minor role missing).' };
    }
    if (!verifiedRoleId || !guild.hasRole(verifiedRoleId) || !guild.hasRole(minorRoleId)) {
      return { ok: false, message: 'Required roles are not configured on this server.' };
    }

    const target = await guild.fetchMember(targetId);
    if (!target) {
      return { ok: false, message: 'User must be a member of this server and have the Verified role.' };
    }
    if (!target.roleIds.has(verifiedRoleId)) {
      return { ok: false, message: 'That user is not verified. Only verified users can be flagged.' };
    }
    if (target.roleIds.has(minorRoleId)) {
      return { ok: false, message: 'That user already has the verified-minor status. No need to flag.' };
    }

    const accountIdentifier = await this.deps.accounts.getAccountIdentifier(targetId);
    if (accountIdentifier && await this.deps.consent.checkParentalConsent(accountIdentifier)) {
      const grant = await grantMinorRole(guild, target, minorRoleId, this.logger);
      return {
        ok: grant === 'added' || grant === 'already_assigned',
        message: `Parental consent already on file. No report created.${GRANT_SUFFIX[grant]}`,
      };
    }

    const channelId = settings.reviewChannelId;
    if (!channelId) {
      return { ok: false, message: 'Minor review channel is not configured. Report could not be created.' };
    }
    if (!guild.hasChannel(channelId)) {
      return { ok: false, message: 'Minor review channel not found. Report could not be created.' };
    }

    const existing = await reports.getActiveReport(targetId);
    if (existing) {
      const updated = await reports.updateDetails(existing.id, { suspectedAge, evidence, reporterId: actorId })
        ?? existing;
      const edited = await this.refreshCard(guild, updated, `Report updated by <@${actorId}>.`, target);
      return {
        ok: true,
        message: edited
          ? 'Report updated with new information. Review channel message edited.'
          : 'Report updated with new information. The review channel message could not be edited.',
      };
    }

    const now = this.clock();
    const statusNotes = accountIdentifier ? '' : 'No linked account found.';
    const draft: CardSubject = {
      id: null,
      userId: targetId,
      reporterId: actorId,
      suspectedAge,
      evidence,
      reportMessageId: '',
      status: 'pending',
      reviewerId: null,
      createdAt: now,
      updatedAt: now,
      associatedBanId: null,
    };
    const posted = await guild.postCard(
      channelId,
      buildReportCard(draft, { statusNotes, avatarUrl: target.avatarUrl }),
    );
    if (!posted.ok) {
      this.logger.warn(`Could not post minor report card for ${targetId}: ${posted.reason} ${posted.error}`);
      return { ok: false, message: 'Could not post the report card to the review channel. No report was created.' };
    }

    const report = await reports.create({
      userId: targetId,
      reporterId: actorId,
      suspectedAge,
      evidence,
      reportMessageId: posted.value.messageId,
    });
    this.logger.info(`Minor report #${report.id} created for ${targetId} by ${actorId}`);

    await this.refreshCard(guild, report, statusNotes, target);
    return { ok: true, message: 'Report created and posted to the review channel.' };
  }

  private async runApprove(action: CardAction & { duration: string }): Promise<WorkflowOutcome> {
    const report = await this.authorize(action, true);
    const seconds = parseDuration(action.duration);
    return this.exclusively(report.id, () => this.applyApproval(action, report, seconds));
  }

  private async applyApproval(action: CardAction, report: MinorReport, seconds: number): Promise<WorkflowOutcome> {
    const { guild, actorId } = action;
    const now = this.clock();
    const unbanEpoch = Math.floor(now.getTime() / 1000) + seconds;
    const ban = await this.deps.bans.banMemberWithEpoch({
      guild,
      userId: report.userId,
      unbanEpoch,
      reason: PARENTAL_CONSENT_BAN_REASON,
      evidence: `Minor report approval by <@${actorId}> (${actorId})`,
      authorId: actorId,
      needsApproval: true,
    });
    if (!ban.ok) {
      return { ok: false, message: ban.message };
    }

    const updated = await this.deps.reports.resolvePending(report.id, 'approved', actorId, ban.banId);
    if (!updated) {
      this.logger.warn(`Minor report #${report.id} was resolved elsewhere after ban #${ban.banId} was issued`);
      return { ok: false, message: `${ban.message} The report had already been resolved by another reviewer.` };
    }
    this.logger.info(`Minor report #${report.id} approved by ${actorId} (ban #${ban.banId})`);

    const member = await guild.fetchMember(report.userId);
    await this.refreshCard(guild, updated, `Approved by <@${actorId}> at ${discordTimestamp(now)}`, member);
    return { ok: true, message: ban.message };
  }

  private async runDeny(action: CardAction & { reason: string }): Promise<WorkflowOutcome> {
    const report = await this.authorize(action, true);
    const { guild, actorId } = action;
    const reason = action.reason.trim() || 'No reason given';
    const now = this.clock();

    const updated = await this.exclusively(report.id, () =>
      this.deps.reports.resolvePending(report.id, 'denied', actorId));
    if (!updated) throw Errors.REPORT_NOT_PENDING();
    await this.deps.notes.addNote({
      userId: report.userId,
      note: `Minor flag denied: ${reason}`,
      moderatorId: actorId,
      date: now,
    });
    this.logger.info(`Minor report #${report.id} denied by ${actorId}`);

    await this.refreshCard(
      guild,
      updated,
      `Denied by <@${actorId}> at ${discordTimestamp(now)}. Reason: ${reason}`,
      null,
    );
    return { ok: true, message: 'Report denied and note added to user history.' };
  }

  private async runRecheck(action: CardAction): Promise<WorkflowOutcome> {
    const report = await this.authorize(action, false);
    const { guild, actorId } = action;
    const { accounts, consent, bans, reports, settings } = this.deps;

    const accountIdentifier = await accounts.getAccountIdentifier(report.userId);
    if (!accountIdentifier) throw Errors.ACCOUNT_NOT_LINKED();

    const hasConsent = await consent.checkParentalConsent(accountIdentifier);
    const member = await guild.fetchMember(report.userId);
    const now = this.clock();

    if (!hasConsent) {
      await this.refreshCard(
        guild,
        report,
        `Recheck (no consent) by <@${actorId}> at ${discordTimestamp(now)}`,
        member,
      );
      return { ok: true, message: 'Consent still not found. No changes made.' };
    }

    const parts: string[] = ['Consent found.'];

    if (member && settings.minorRoleId) {
      const grant = await grantMinorRole(guild, member, settings.minorRoleId, this.logger);
      parts.push(GRANT_SUFFIX[grant].trim());
    } else {
      parts.push('User is not a member of this server; role not assigned.');
    }

    const activeBan = await bans.getActiveBan(report.userId);
    if (activeBan && report.associatedBanId !== null && activeBan.id === report.associatedBanId) {
      const lifted = await bans.unbanMember(guild, report.userId);
      if (lifted.ok) {
        parts.push('User unbanned.');
      } else {
        this.logger.warn(`Failed to lift ban #${activeBan.id} for ${report.userId}: ${lifted.reason} ${lifted.error}`);
        parts.push('The ban could not be lifted; run Recheck again.');
      }
    } else if (!activeBan) {
      parts.push('User was not banned by this report.');
    } else {
      parts.push('The active ban was not issued by this report and was left in place.');
    }

    const updated = await reports.updateStatus(report.id, 'consent_verified', actorId) ?? report;
    this.logger.info(`Minor report #${report.id} consent verified by ${actorId}`);

    await this.refreshCard(
      guild,
      updated,
      `Consent verified by <@${actorId}> at ${discordTimestamp(now)}`,
      member,
    );
    return { ok: true, message: parts.join(' ') };
  }

  /** Re-resolve the report behind a card and apply the reviewer gate. */
  private async authorize(action: CardAction, requirePending: boolean): Promise<MinorReport> {
    const report = await this.deps.reports.getByMessageId(action.messageId);
    if (!report) throw Errors.REPORT_NOT_FOUND();
    if (!await this.deps.reviewers.isReviewer(action.actorId)) throw Errors.NOT_REVIEWER();
    if (requirePending && report.status !== 'pending') throw Errors.REPORT_NOT_PENDING();
    return report;
  }

  /**
   * Re-render the card from stored state. A failed edit leaves storage as the
   * source of truth; the card catches up on the next transition.
   */
  private async refreshCard(
    guild: GuildPort,
    report: MinorReport,
    statusNotes: string,
    member: MemberView | null,
  ): Promise<boolean> {
    const channelId = this.deps.settings.reviewChannelId;
    if (!channelId) {
      this.logger.warn(`No review channel configured; card for report #${report.id} not refreshed`);
      return false;
    }

    const card = buildReportCard(report, {
      statusNotes,
      profileUrl: await this.profileUrl(report.userId),
      avatarUrl: member?.avatarUrl ?? null,
    });
    const result = await guild.editCard(channelId, report.reportMessageId, card);
    if (!result.ok) {
      this.logger.warn(`Failed to edit minor report card #${report.id}: ${result.reason} ${result.error}`);
      return false;
    }
    return true;
  }

  private async profileUrl(userId: string): Promise<string | null> {
    const base = this.deps.settings.profileBaseUrl;
    if (!base) return null;
    const profileUserId = await this.deps.accounts.getProfileUserId(userId);
    return profileUserId === null ? null : `${base}${profileUserId}`;
  }

  private async exclusively<T>(reportId: number, run: () => Promise<T>): Promise<T> {
    if (this.resolving.has(reportId)) throw Errors.REPORT_BUSY();
    this.resolving.add(reportId);
    try {
      return await run();
    } finally {
      this.resolving.delete(reportId);
    }
  }

  private async guarded(run: () => Promise<WorkflowOutcome>): Promise<WorkflowOutcome> {
    try {
      return await run();
    } catch (err) {
      if (isAppError(err)) return { ok: false, message: err.message };
      throw err;
    }
  }
}

import { REPORT_COLORS, type MinorReport } from '@safeguard/shared';
import { yearsUntil18, isValidSuspectedAge } from './age.js';

const FIELD_VALUE_LIMIT = 1024;

export interface CardField {
  name: string;
  value: string;
  inline: boolean;
}

/** Platform-neutral rendering of a report; the bot turns it into an embed plus buttons. */
export interface ReportCard {
  title: string;
  color: number;
  fields: CardField[];
  footer: string;
  thumbnailUrl: string | null;
  showControls: boolean;
}

export interface CardOptions {
  statusNotes?: string;
  profileUrl?: string | null;
  avatarUrl?: string | null;
}

/** A report that has not been stored yet has no id. */
export type CardSubject = Omit<MinorReport, 'id'> & { id: number | null };

function truncate(value: string, limit = FIELD_VALUE_LIMIT): string {
  return value.length <= limit ? value : `${value.slice(0, limit - 1)}…`;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** "2025-03-04 05:06 UTC" */
export function formatUtcMinute(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
    + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`;
}

/** Discord full date-time markdown, e.g. `<t:1700000000:F>`. */
export function discordTimestamp(date: Date): string {
  return `<t:${Math.floor(date.getTime() / 1000)}:F>`;
}

export function statusLabel(status: MinorReport['status']): string {
  return status.toUpperCase().replace(/_/g, ' ');
}

export function buildReportCard(report: CardSubject, options: CardOptions = {}): ReportCard {
  const title = report.id === null
    ? `Minor Report - ${statusLabel(report.status)}`
    : `Minor Report #${report.id} - ${statusLabel(report.status)}`;

  const fields: CardField[] = [
    { name: 'User', value: `<@${report.userId}> (${report.userId})`, inline: false },
  ];
  if (options.profileUrl) {
    fields.push({ name: 'Profile', value: `[View profile](${options.profileUrl})`, inline: false });
  }

  const suggested = isValidSuspectedAge(report.suspectedAge)
    ? `${yearsUntil18(report.suspectedAge)} years (until 18)`
    : 'Unknown';
  fields.push(
    { name: 'Suspected Age', value: String(report.suspectedAge), inline: true },
    { name: 'Suggested Ban Duration', value: suggested, inline: true },
    { name: 'Evidence', value: truncate(report.evidence) || '—', inline: false },
    { name: 'Flagged By', value: `<@${report.reporterId}>`, inline: true },
    { name: 'Flagged At', value: formatUtcMinute(report.createdAt), inline: true },
  );
  if (options.statusNotes) {
    fields.push({ name: 'Status Updates', value: truncate(options.statusNotes), inline: false });
  }

  const footer = report.id === null
    ? `Report pending | Last updated: ${formatUtcMinute(report.updatedAt)}`
    : `Report ID: ${report.id} | Last updated: ${formatUtcMinute(report.updatedAt)}`;

  return {
    title,
    color: REPORT_COLORS[report.status],
    fields,
    footer,
    thumbnailUrl: options.avatarUrl ?? null,
    showControls: report.status === 'pending',
  };
}

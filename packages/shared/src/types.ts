export type MinorReportStatus = 'pending' | 'approved' | 'denied' | 'consent_verified';

const MINOR_REPORT_STATUSES: readonly MinorReportStatus[] = [
  'pending',
  'approved',
  'denied',
  'consent_verified',
];

export interface MinorReport {
  id: number;
  userId: string;
  reporterId: string;
  suspectedAge: number;
  evidence: string;
  reportMessageId: string;
  status: MinorReportStatus;
  reviewerId: string | null;
  createdAt: Date;
  updatedAt: Date;
  associatedBanId: number | null;
}

export interface MinorReviewReviewer {
  id: number;
  userId: string;
  addedBy: string | null;
  createdAt: Date;
}

export interface BanRecord {
  id: number;
  userId: string;
  reason: string;
  moderatorId: string | null;
  /** Unix seconds. */
  unbanTime: number;
  approved: boolean;
  unbanned: boolean;
  createdAt: Date;
}

export interface MuteRecord {
  id: number;
  userId: string;
  reason: string;
  moderatorId: string | null;
  /** Unix seconds. */
  unmuteTime: number;
}

export type PlatformFailure = 'forbidden' | 'not_found' | 'transport_error';

export interface PlatformError {
  ok: false;
  reason: PlatformFailure;
  error: string;
}

/** Outcome of a call into the chat platform. Callers branch on `ok` instead of catching. */
export type PlatformResult = { ok: true } | PlatformError;

export type PlatformValue<T> = { ok: true; value: T } | PlatformError;

export function isMinorReportStatus(value: string): value is MinorReportStatus {
  return MINOR_REPORT_STATUSES.some(status => status === value);
}

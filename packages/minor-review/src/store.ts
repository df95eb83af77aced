import { and, desc, eq, inArray } from 'drizzle-orm';
import type { Database } from '@safeguard/db';
import { minorReports } from '@safeguard/db';
import { isMinorReportStatus, type MinorReport, type MinorReportStatus } from '@safeguard/shared';

export interface NewMinorReport {
  userId: string;
  reporterId: string;
  suspectedAge: number;
  evidence: string;
  reportMessageId: string;
}

export interface ReportDetails {
  suspectedAge: number;
  evidence: string;
  reporterId: string;
}

/** Statuses whose protective role lapses once the user ages out. */
export const EXPIRABLE_STATUSES: readonly MinorReportStatus[] = ['approved', 'consent_verified'];

export interface ReportStore {
  getActiveReport(userId: string): Promise<MinorReport | null>;
  getByMessageId(messageId: string): Promise<MinorReport | null>;
  create(fields: NewMinorReport): Promise<MinorReport>;
  /** Always bumps `updatedAt`. `associatedBanId` is only written when given. */
  updateStatus(
    id: number,
    status: MinorReportStatus,
    reviewerId: string,
    associatedBanId?: number,
  ): Promise<MinorReport | null>;
  /** Like `updateStatus`, but only while the report is still pending; `null` otherwise. */
  resolvePending(
    id: number,
    status: MinorReportStatus,
    reviewerId: string,
    associatedBanId?: number,
  ): Promise<MinorReport | null>;
  updateDetails(id: number, details: ReportDetails): Promise<MinorReport | null>;
  listExpirable(): Promise<MinorReport[]>;
  getConsentVerified(userId: string): Promise<MinorReport | null>;
}

type ReportRow = typeof minorReports.$inferSelect;

function toMinorReport(row: ReportRow): MinorReport {
  if (!isMinorReportStatus(row.status)) {
    throw new Error(`Minor report ${row.id} has unknown status "${row.status}"`);
  }
  return {
    id: row.id,
    userId: row.userId,
    reporterId: row.reporterId,
    suspectedAge: row.suspectedAge,
    evidence: row.evidence,
    reportMessageId: row.reportMessageId,
    status: row.status,
    reviewerId: row.reviewerId,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    associatedBanId: row.associatedBanId,
  };
}

export class DrizzleReportStore implements ReportStore {
  constructor(
    private readonly db: Database,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async getActiveReport(userId: string): Promise<MinorReport | null> {
    const [row] = await this.db
      .select()
      .from(minorReports)
      .where(and(eq(minorReports.userId, userId), eq(minorReports.status, 'pending')))
      .limit(1);
    return row ? toMinorReport(row) : null;
  }

  async getByMessageId(messageId: string): Promise<MinorReport | null> {
    const [row] = await this.db
      .select()
      .from(minorReports)
      .where(eq(minorReports.reportMessageId, messageId))
      .limit(1);
    return row ? toMinorReport(row) : null;
  }

  async create(fields: NewMinorReport): Promise<MinorReport> {
    const now = this.clock();
    const [row] = await this.db
      .insert(minorReports)
      .values({ ...fields, status: 'pending', createdAt: now, updatedAt: now })
      .returning();
    return toMinorReport(row);
  }

  async updateStatus(
    id: number,
    status: MinorReportStatus,
    reviewerId: string,
    associatedBanId?: number,
  ): Promise<MinorReport | null> {
    const [row] = await this.db
      .update(minorReports)
      .set({
        status,
        reviewerId,
        updatedAt: this.clock(),
        ...(associatedBanId !== undefined ? { associatedBanId } : {}),
      })
      .where(eq(minorReports.id, id))
      .returning();
    return row ? toMinorReport(row) : null;
  }

  async resolvePending(
    id: number,
    status: MinorReportStatus,
    reviewerId: string,
    associatedBanId?: number,
  ): Promise<MinorReport | null> {
    const [row] = await this.db
      .update(minorReports)
      .set({
        status,
        reviewerId,
        updatedAt: this.clock(),
        ...(associatedBanId !== undefined ? { associatedBanId } : {}),
      })
      .where(and(eq(minorReports.id, id), eq(minorReports.status, 'pending')))
      .returning();
    return row ? toMinorReport(row) : null;
  }

  async updateDetails(id: number, details: ReportDetails): Promise<MinorReport | null> {
    const [row] = await this.db
      .update(minorReports)
      .set({ ...details, updatedAt: this.clock() })
      .where(eq(minorReports.id, id))
      .returning();
    return row ? toMinorReport(row) : null;
  }

  async listExpirable(): Promise<MinorReport[]> {
    const rows = await this.db
      .select()
      .from(minorReports)
      .where(inArray(minorReports.status, [...EXPIRABLE_STATUSES]));
    return rows.map(toMinorReport);
  }

  async getConsentVerified(userId: string): Promise<MinorReport | null> {
    const [row] = await this.db
      .select()
      .from(minorReports)
      .where(and(eq(minorReports.userId, userId), eq(minorReports.status, 'consent_verified')))
      .orderBy(desc(minorReports.id))
      .limit(1);
    return row ? toMinorReport(row) : null;
  }
}

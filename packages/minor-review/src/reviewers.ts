import { asc, eq } from 'drizzle-orm';
import type { Database } from '@safeguard/db';
import { minorReviewReviewers } from '@safeguard/db';
import type { Logger, MinorReviewReviewer } from '@safeguard/shared';
import { TtlCache } from './cache.js';

export interface NewReviewer {
  userId: string;
  addedBy: string | null;
}

/** Storage for the reviewer allowlist. `user_id` is unique. */
export interface ReviewerStore {
  listUserIds(): Promise<string[]>;
  findByUserId(userId: string): Promise<MinorReviewReviewer | null>;
  insert(rows: NewReviewer[]): Promise<void>;
  deleteByUserId(userId: string): Promise<boolean>;
  hasAny(): Promise<boolean>;
}

export type ReviewerChange =
  | { ok: true; count: number }
  | { ok: false; reason: 'already_reviewer' | 'not_reviewer' | 'already_configured' | 'no_defaults' };

export class DrizzleReviewerStore implements ReviewerStore {
  constructor(private readonly db: Database) {}

  async listUserIds(): Promise<string[]> {
    const rows = await this.db
      .select({ userId: minorReviewReviewers.userId })
      .from(minorReviewReviewers)
      .orderBy(asc(minorReviewReviewers.id));
    return rows.map(r => r.userId);
  }

  async findByUserId(userId: string): Promise<MinorReviewReviewer | null> {
    const [row] = await this.db
      .select()
      .from(minorReviewReviewers)
      .where(eq(minorReviewReviewers.userId, userId))
      .limit(1);
    return row ?? null;
  }

  async insert(rows: NewReviewer[]): Promise<void> {
    if (rows.length === 0) return;
    await this.db.insert(minorReviewReviewers).values(rows);
  }

  async deleteByUserId(userId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(minorReviewReviewers)
      .where(eq(minorReviewReviewers.userId, userId))
      .returning({ id: minorReviewReviewers.id });
    return deleted.length > 0;
  }

  async hasAny(): Promise<boolean> {
    const [row] = await this.db
      .select({ id: minorReviewReviewers.id })
      .from(minorReviewReviewers)
      .limit(1);
    return row !== undefined;
  }
}

/**
 * Who may adjudicate minor reports. Reads go through a TTL cache that every
 * mutation invalidates before returning, so the next read sees the change.
 */
export class ReviewerRegistry {
  constructor(
    private readonly store: ReviewerStore,
    private readonly cache: TtlCache<readonly string[]> = new TtlCache<readonly string[]>(),
    private readonly logger?: Logger,
  ) {}

  async listReviewerIds(): Promise<readonly string[]> {
    return this.cache.getOrLoad(async () => Object.freeze(await this.store.listUserIds()));
  }

  async isReviewer(userId: string): Promise<boolean> {
    const ids = await this.listReviewerIds();
    return ids.includes(userId);
  }

  invalidateCache(): void {
    this.cache.invalidate();
  }

  async add(userId: string, addedBy: string | null): Promise<ReviewerChange> {
    const existing = await this.store.findByUserId(userId);
    if (existing) {
      return { ok: false, reason: 'already_reviewer' };
    }
    await this.store.insert([{ userId, addedBy }]);
    this.invalidateCache();
    this.logger?.info(`Added minor reviewer ${userId} (by ${addedBy ?? 'unknown'})`);
    return { ok: true, count: 1 };
  }

  async remove(userId: string): Promise<ReviewerChange> {
    const deleted = await this.store.deleteByUserId(userId);
    if (!deleted) {
      return { ok: false, reason: 'not_reviewer' };
    }
    this.invalidateCache();
    this.logger?.info(`Removed minor reviewer ${userId}`);
    return { ok: true, count: 1 };
  }

  /** One-time bulk insert of the default reviewers; refuses once anyone is configured. */
  async seed(defaultIds: readonly string[], addedBy: string | null): Promise<ReviewerChange> {
    if (await this.store.hasAny()) {
      return { ok: false, reason: 'already_configured' };
    }
    const unique = [...new Set(defaultIds)];
    if (unique.length === 0) {
      return { ok: false, reason: 'no_defaults' };
    }
    await this.store.insert(unique.map(userId => ({ userId, addedBy })));
    this.invalidateCache();
    this.logger?.info(`Seeded ${unique.length} minor reviewer(s)`);
    return { ok: true, count: unique.length };
  }
}

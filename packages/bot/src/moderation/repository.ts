import { and, desc, eq, lte } from 'drizzle-orm';
import type { Database } from '@safeguard/db';
import { bans, mutes, userNotes } from '@safeguard/db';
import type { BanRecord, MuteRecord } from '@safeguard/shared';

export interface NewBan {
  userId: string;
  reason: string;
  moderatorId: string | null;
  unbanTime: number;
  approved: boolean;
}

export interface NewNote {
  userId: string;
  note: string;
  moderatorId: string;
  /** YYYY-MM-DD */
  date: string;
}

export interface ModerationRepository {
  insertBan(ban: NewBan): Promise<BanRecord>;
  latestActiveBan(userId: string): Promise<BanRecord | null>;
  markUnbanned(userId: string): Promise<void>;
  listDueBans(untilEpoch: number): Promise<BanRecord[]>;
  listDueMutes(untilEpoch: number): Promise<MuteRecord[]>;
  deleteMutes(userId: string): Promise<void>;
  insertNote(note: NewNote): Promise<void>;
}

export class DrizzleModerationRepository implements ModerationRepository {
  constructor(private readonly db: Database) {}

  async insertBan(ban: NewBan): Promise<BanRecord> {
    const [row] = await this.db.insert(bans).values(ban).returning();
    return row;
  }

  async latestActiveBan(userId: string): Promise<BanRecord | null> {
    const [row] = await this.db
      .select()
      .from(bans)
      .where(and(eq(bans.userId, userId), eq(bans.unbanned, false)))
      .orderBy(desc(bans.id))
      .limit(1);
    return row ?? null;
  }

  async markUnbanned(userId: string): Promise<void> {
    await this.db
      .update(bans)
      .set({ unbanned: true })
      .where(and(eq(bans.userId, userId), eq(bans.unbanned, false)));
  }

  async listDueBans(untilEpoch: number): Promise<BanRecord[]> {
    return this.db
      .select()
      .from(bans)
      .where(and(eq(bans.unbanned, false), lte(bans.unbanTime, untilEpoch)));
  }

  async listDueMutes(untilEpoch: number): Promise<MuteRecord[]> {
    return this.db
      .select()
      .from(mutes)
      .where(lte(mutes.unmuteTime, untilEpoch));
  }

  async deleteMutes(userId: string): Promise<void> {
    await this.db.delete(mutes).where(eq(mutes.userId, userId));
  }

  async insertNote(note: NewNote): Promise<void> {
    await this.db.insert(userNotes).values(note);
  }
}

import { eq } from 'drizzle-orm';
import type { Database } from '@safeguard/db';
import { accountLinks } from '@safeguard/db';

/** Resolves a Discord user to the external account they verified with. */
export interface AccountLinks {
  getAccountIdentifier(discordUserId: string): Promise<string | null>;
  getProfileUserId(discordUserId: string): Promise<number | null>;
}

export class DrizzleAccountLinks implements AccountLinks {
  constructor(private readonly db: Database) {}

  async getAccountIdentifier(discordUserId: string): Promise<string | null> {
    const [row] = await this.db
      .select({ accountIdentifier: accountLinks.accountIdentifier })
      .from(accountLinks)
      .where(eq(accountLinks.discordUserId, discordUserId))
      .limit(1);
    return row?.accountIdentifier ?? null;
  }

  async getProfileUserId(discordUserId: string): Promise<number | null> {
    const [row] = await this.db
      .select({ profileUserId: accountLinks.profileUserId })
      .from(accountLinks)
      .where(eq(accountLinks.discordUserId, discordUserId))
      .limit(1);
    return row?.profileUserId ?? null;
  }
}

import type { BanRecord, PlatformResult, PlatformValue } from '@safeguard/shared';
import type { ReportCard } from './card.js';

export interface MemberView {
  id: string;
  displayName: string;
  roleIds: ReadonlySet<string>;
  avatarUrl: string | null;
}

/**
 * The slice of a chat guild the minor-review workflow acts on. Mutations
 * report failures as result variants; implementations must not throw for
 * permission, missing-entity or transport problems.
 */
export interface GuildPort {
  readonly id: string;
  readonly name: string;
  fetchMember(userId: string): Promise<MemberView | null>;
  hasRole(roleId: string): boolean;
  hasChannel(channelId: string): boolean;
  addRole(userId: string, roleId: string, reason?: string): Promise<PlatformResult>;
  removeRole(userId: string, roleId: string, reason?: string): Promise<PlatformResult>;
  ban(userId: string, reason: string): Promise<PlatformResult>;
  unban(userId: string, reason?: string): Promise<PlatformResult>;
  sendDirectMessage(userId: string, content: string): Promise<PlatformResult>;
  postCard(channelId: string, card: ReportCard): Promise<PlatformValue<{ messageId: string }>>;
  editCard(channelId: string, messageId: string, card: ReportCard): Promise<PlatformResult>;
}

export interface BanOrder {
  guild: GuildPort;
  userId: string;
  /** Unix seconds. */
  unbanEpoch: number;
  /** Shown to the banned user. */
  reason: string;
  /** Moderator-facing context stored alongside the ban. */
  evidence: string;
  authorId: string;
  needsApproval: boolean;
}

export type BanOutcome =
  | { ok: true; banId: number; message: string }
  | { ok: false; message: string };

export interface BanService {
  banMemberWithEpoch(order: BanOrder): Promise<BanOutcome>;
  getActiveBan(userId: string): Promise<BanRecord | null>;
  unbanMember(guild: GuildPort, userId: string): Promise<PlatformResult>;
}

export interface NoteService {
  addNote(note: { userId: string; note: string; moderatorId: string; date: Date }): Promise<void>;
}

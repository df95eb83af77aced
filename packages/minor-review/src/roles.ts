import type { Logger } from '@safeguard/shared';
import type { GuildPort, MemberView } from './ports.js';

export type GrantResult = 'added' | 'already_assigned' | 'role_missing' | 'failed';

/** Give a member the protective minor role. Failures are logged and reported, never retried. */
export async function grantMinorRole(
  guild: GuildPort,
  member: MemberView,
  roleId: string,
  logger: Logger,
): Promise<GrantResult> {
  if (!guild.hasRole(roleId)) return 'role_missing';
  if (member.roleIds.has(roleId)) return 'already_assigned';

  const result = await guild.addRole(member.id, roleId, 'Minor review: parental consent verified');
  if (!result.ok) {
    logger.warn(`Failed to assign minor role to ${member.id}: ${result.reason} ${result.error}`);
    return 'failed';
  }
  return 'added';
}

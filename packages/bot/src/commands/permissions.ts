/** Anything with role-id membership: a discord.js role cache or a plain set. */
export interface RoleHolder {
  has(roleId: string): boolean;
}

export function hasAnyRole(roles: RoleHolder, allowed: readonly string[]): boolean {
  return allowed.some(roleId => roles.has(roleId));
}

import { ChatInputCommandInteraction, PermissionFlagsBits } from 'discord.js';

export interface MemberAccess {
  isAdministrator: boolean;
  roleIds: string[];
}

const SNOWFLAKE = /^\d+$/;

/** Administrators always pass; otherwise the member needs the configured admin role. */
export function hasAdminAccess(access: MemberAccess, adminRoleId: string): boolean {
  if (access.isAdministrator) return true;
  if (!SNOWFLAKE.test(adminRoleId)) return false;
  return access.roleIds.includes(adminRoleId);
}

export function getMemberAccess(interaction: ChatInputCommandInteraction): MemberAccess {
  const member = interaction.member;
  const isAdministrator = interaction.memberPermissions?.has(PermissionFlagsBits.Administrator) ?? false;

  if (!member) {
    return { isAdministrator, roleIds: [] };
  }

  const roleIds = Array.isArray(member.roles) ? member.roles : [...member.roles.cache.keys()];
  return { isAdministrator, roleIds };
}

export class PermissionManager {
  constructor(private adminRoleId: string) {}

  isAdmin(interaction: ChatInputCommandInteraction): boolean {
    return hasAdminAccess(getMemberAccess(interaction), this.adminRoleId);
  }
}

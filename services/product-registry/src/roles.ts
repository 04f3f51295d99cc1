import { parseRoleAssignments, type RegistryRole } from "@wildtrace/shared";

export interface RoleRecord {
  role: string;
}

/**
 * Identity/role lookup owned by another service. The registry only reads it.
 */
export interface RoleRegistry {
  getRole(identity: string): RoleRecord | null;
}

export class StaticRoleRegistry implements RoleRegistry {
  private readonly roles: Map<string, RegistryRole>;

  constructor(assignments: Iterable<[string, RegistryRole]> = []) {
    this.roles = new Map(assignments);
  }

  getRole(identity: string): RoleRecord | null {
    const role = this.roles.get(identity);
    return role ? { role } : null;
  }
}

export function buildRoleRegistryFromEnv(raw = process.env.ROLE_ASSIGNMENTS): RoleRegistry {
  return new StaticRoleRegistry(parseRoleAssignments(raw));
}

export function hasRole(
  roles: RoleRegistry,
  identity: string,
  requiredRole: RegistryRole,
): boolean {
  const record = roles.getRole(identity);
  return record !== null && record.role === requiredRole;
}

import { REGISTRY_ROLES, type RegistryRole } from "../types/product.js";

export const CALLER_IDENTITY_HEADER = "x-caller-identity";
export const SERVICE_AUTH_HEADER = "x-service-token";

function firstString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    return typeof first === "string" ? first : null;
  }
  return null;
}

export function parseCallerIdentityHeader(value: unknown): string | null {
  const raw = firstString(value);
  if (raw === null) return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function isRegistryRole(value: unknown): value is RegistryRole {
  return typeof value === "string" && REGISTRY_ROLES.some((role) => role === value);
}

/**
 * Parses `identity:role` pairs separated by commas, e.g.
 * `ST1ADMIN:admin,ST2SUP:supplier`. Entries with an unknown role or
 * missing identity are dropped; a later entry for the same identity wins.
 */
export function parseRoleAssignments(raw: string | undefined): Map<string, RegistryRole> {
  const assignments = new Map<string, RegistryRole>();
  const source = (raw || "").trim();
  if (!source) return assignments;

  for (const entry of source.split(",")) {
    const separator = entry.lastIndexOf(":");
    if (separator <= 0) continue;
    const identity = entry.slice(0, separator).trim();
    const role = entry.slice(separator + 1).trim().toLowerCase();
    if (!identity || !isRegistryRole(role)) continue;
    assignments.set(identity, role);
  }
  return assignments;
}

export function buildServiceAuthHeaders(
  token: string | undefined | null,
): Record<string, string> {
  if (typeof token !== "string") return {};
  const trimmed = token.trim();
  if (!trimmed) return {};
  return { [SERVICE_AUTH_HEADER]: trimmed };
}

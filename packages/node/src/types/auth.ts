/**
 * Operator authentication types.
 *
 * Operators authenticate with an API key in the X-Api-Key header.
 * Role hierarchy: admin > operator > viewer
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/**
 * - read:  list and inspect trades and dead letters
 * - write: replay and resolve dead letters
 * - admin: change runtime settings
 */
export type Permission = "read" | "write" | "admin";

export const ROLES: readonly Role[] = ["admin", "operator", "viewer"];

export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

export function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

// =============================================================================
// Auth Context
// =============================================================================

export interface AuthContext {
  /** Index of the key in API_KEYS; the key itself is never exposed */
  readonly keyId: string;
  readonly role: Role;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
}

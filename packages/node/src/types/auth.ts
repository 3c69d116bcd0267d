/**
 * Authentication and authorization types.
 *
 * Callers authenticate with an API key (X-Api-Key header). Each key
 * carries one role; routes require a permission.
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export const ROLES = ["admin", "transport", "oracle", "verifier", "viewer"] as const;

export type Role = (typeof ROLES)[number];

export type Permission = "read" | "deliver" | "publish-price" | "submit-signed" | "manage";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  transport: ["read", "deliver"],
  oracle: ["read", "publish-price"],
  verifier: ["read", "submit-signed"],
  admin: ["read", "deliver", "publish-price", "submit-signed", "manage"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly identity: string;
  readonly role: Role;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
}

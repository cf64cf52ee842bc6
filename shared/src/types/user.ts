/**
 * User and access-control types.
 */

export type UserRole = 'user' | 'admin';

/**
 * Account lifecycle: new accounts start pending or active depending on the access
 * policy; pending accounts are approved by an admin; any account can be disabled.
 * A disabled account is never reactivated by a login.
 */
export type UserStatus = 'pending' | 'active' | 'disabled';

/**
 * How first-time logins are admitted.
 * - allowlist_then_approval: allowlisted emails become active, everyone else waits for approval
 * - allowlist_strict: same as above, used where only allowlisted users should ever be approved
 * - open: every new account is active immediately
 */
export type AccessPolicy = 'allowlist_then_approval' | 'allowlist_strict' | 'open';

/** User response shape for API responses (never includes the identity-provider subject) */
export interface UserResponse {
  id: string;
  email: string;
  displayName: string;
  pictureUrl: string | null;
  role: UserRole;
  status: UserStatus;
  approvedAt: string | null;
  lastLoginAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface UpdateProfileRequest {
  displayName: string;
}

export interface AdminUserListQuery {
  status?: UserStatus;
  q?: string;
}

export interface ApproveUserRequest {
  role?: UserRole;
}

/**
 * Email allowlist entry. Allowlisted emails are activated on first login
 * and receive the entry's default role.
 */
export interface AllowlistEntryResponse {
  id: number;
  email: string;
  defaultRole: UserRole;
  note: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface CreateAllowlistEntryRequest {
  email: string;
  defaultRole?: UserRole;
  note?: string | null;
}

/**
 * Response for GET /api/auth/me.
 */
export interface AuthMeResponse {
  user: UserResponse | null;
  oidcEnabled: boolean;
}

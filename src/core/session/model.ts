// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/session/model`
 * Purpose: Session domain entities - identity, role, profile, and the published session snapshot.
 * Scope: Pure domain types with no infrastructure dependencies. Does not handle persistence or provider calls.
 * Invariants: identity === null implies role === DEFAULT_ROLE and profile === null once signed out; phases are validated by the rules module.
 * Side-effects: none (pure domain types)
 * Notes: Snapshots are immutable; the coordinator publishes a new object on every change.
 * Links: Used by ports, features/session, adapters
 * @public
 */

import type { AuthError } from "./errors";

/**
 * Account type. Gates which flows and permissions apply.
 */
export type UserRole = "athlete" | "coach";

export const USER_ROLES: readonly UserRole[] = ["athlete", "coach"];

export const DEFAULT_ROLE: UserRole = "athlete";

/**
 * Session states.
 * State machine: signed_out → signing_up → signed_in_new → signed_in_existing
 *                signed_out → signing_in → signed_in_existing
 *                any → signing_out → signed_out
 */
export type SessionPhase =
  | "signed_out"
  | "signing_up"
  | "signing_in"
  | "signed_in_new"
  | "signed_in_existing"
  | "signing_out";

/**
 * Opaque credential for a signed-in account, as issued by the credential provider.
 */
export interface Identity {
  uid: string;
  email: string | null;
  displayName: string | null;
  emailVerified: boolean;
}

/**
 * Durable remote profile document stored under `users/{uid}`.
 */
export interface UserProfile {
  uid: string;
  email: string;
  role: UserRole;
  isPremium: boolean;
  displayName: string | null;
  /** ISO timestamp; null until the store has assigned one */
  createdAt: string | null;
  updatedAt: string | null;
}

/**
 * Where the profile reconciliation currently stands.
 * - repaired: signup fallback wrote a profile built from local state
 * - unavailable: soft error, profile stays null until the next reconciliation
 */
export type ProfileStatus =
  | "idle"
  | "loading"
  | "loaded"
  | "repaired"
  | "unavailable";

/**
 * Mutable session fields owned by the coordinator.
 */
export interface SessionState {
  phase: SessionPhase;
  identity: Identity | null;
  isNewSignup: boolean;
  role: UserRole;
  onboardingComplete: boolean;
  profile: UserProfile | null;
  profileStatus: ProfileStatus;
  pendingInvitationCount: number;
  isLoading: boolean;
  errorMessage: string | null;
  lastError: AuthError | null;
}

/**
 * Published, read-only view of the session for the UI layer.
 */
export interface SessionSnapshot extends Readonly<SessionState> {
  readonly isSignedIn: boolean;
  readonly needsOnboarding: boolean;
}

export interface TokenInfo {
  token: string;
  issuedAt: string;
  expiresAt: string;
}

export interface RefreshedToken extends TokenInfo {
  /** True when the token expires within TOKEN_EXPIRY_WARNING_MS */
  expiresSoon: boolean;
}

/**
 * Outcome of a user-initiated session operation.
 * `cancelled` means a sign-out superseded the operation before it committed.
 */
export type SessionResult<T> =
  | { status: "ok"; value: T }
  | { status: "failed"; error: AuthError }
  | { status: "cancelled" };

export type ProfileLoadMode = "signup" | "existing";

export type ProfileLoadOutcome =
  | { status: "loaded"; profile: UserProfile }
  | { status: "repaired"; profile: UserProfile }
  | { status: "unavailable" }
  | { status: "cancelled" };

export type DeletionStep =
  | "storage"
  | "profile"
  | "biometric"
  | "mirror"
  | "credential";

export interface DeletionReport {
  uid: string;
  /** Steps that failed before the credential itself was deleted */
  failedSteps: DeletionStep[];
}

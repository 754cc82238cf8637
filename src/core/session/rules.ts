// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/session/rules`
 * Purpose: Business rules for the session state machine, role reconciliation, and profile-load backoff.
 * Scope: Pure functions and constants. Does not perform I/O or hold state.
 * Invariants: Signed-out snapshots always carry DEFAULT_ROLE and no profile; during the signup window the local role wins over remote.
 * Side-effects: none (pure functions)
 * Notes: Backoff delays double from the base interval; attempt count is bounded.
 * Links: Used by features/session/services
 * @public
 */

import {
  DEFAULT_ROLE,
  type Identity,
  type ProfileLoadMode,
  type SessionPhase,
  type SessionSnapshot,
  type SessionState,
  USER_ROLES,
  type UserRole,
} from "./model";

/** Profile reads attempted before giving up */
export const PROFILE_LOAD_MAX_ATTEMPTS = 5;

/** First backoff delay in milliseconds; each following delay doubles */
export const PROFILE_LOAD_BASE_DELAY_MS = 500;

/** Tokens closer than this to expiry are reported as expiring soon (5 minutes) */
export const TOKEN_EXPIRY_WARNING_MS = 5 * 60 * 1000;

/** Minimum password length the credential provider accepts */
export const MIN_PASSWORD_LENGTH = 6;

const ALLOWED_TRANSITIONS: Readonly<Record<SessionPhase, SessionPhase[]>> = {
  signed_out: ["signing_up", "signing_in", "signed_in_existing"],
  signing_up: [
    "signing_in",
    "signed_in_new",
    "signed_in_existing",
    "signed_out",
    "signing_out",
  ],
  signing_in: [
    "signing_up",
    "signed_in_new",
    "signed_in_existing",
    "signed_out",
    "signing_out",
  ],
  signed_in_new: [
    "signed_in_existing",
    "signing_up",
    "signing_in",
    "signing_out",
  ],
  signed_in_existing: ["signing_up", "signing_in", "signing_out"],
  signing_out: ["signed_out", "signing_up", "signing_in"],
};

/**
 * Validates if a phase change is allowed.
 * Staying in the same phase is not a transition and is always allowed.
 */
export function isValidTransition(
  from: SessionPhase,
  to: SessionPhase
): boolean {
  if (from === to) return true;
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isSignedInPhase(phase: SessionPhase): boolean {
  return phase === "signed_in_new" || phase === "signed_in_existing";
}

export function isPendingPhase(phase: SessionPhase): boolean {
  return (
    phase === "signing_up" || phase === "signing_in" || phase === "signing_out"
  );
}

/**
 * Parses a stored or remote role value; anything unrecognised falls back to the default.
 */
export function parseRole(value: unknown): UserRole {
  return USER_ROLES.find((role) => role === value) ?? DEFAULT_ROLE;
}

/**
 * Resolves which role the UI observes after reading the remote profile.
 * During the signup window the locally pre-set role takes precedence over a possibly-stale read;
 * for an existing sign-in the server is authoritative.
 */
export function resolveObservedRole(input: {
  mode: ProfileLoadMode;
  isNewSignup: boolean;
  localRole: UserRole;
  remoteRole: UserRole;
}): UserRole {
  if (input.mode === "signup" && input.isNewSignup) {
    return input.localRole;
  }
  return input.remoteRole;
}

/**
 * Delays slept between profile-load attempts: one fewer than the attempt count,
 * starting at baseDelayMs and doubling each time.
 */
export function backoffDelays(
  maxAttempts: number,
  baseDelayMs: number
): number[] {
  const delays: number[] = [];
  for (let attempt = 1; attempt < maxAttempts; attempt += 1) {
    delays.push(baseDelayMs * 2 ** (attempt - 1));
  }
  return delays;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function isTokenExpiringSoon(expiresAt: string, now: string): boolean {
  return Date.parse(expiresAt) - Date.parse(now) <= TOKEN_EXPIRY_WARNING_MS;
}

/**
 * Fresh signed-out state. The persisted onboarding flag is the only field that
 * survives into it, and only until an identity is known.
 */
export function signedOutState(): SessionState {
  return {
    phase: "signed_out",
    identity: null,
    isNewSignup: false,
    role: DEFAULT_ROLE,
    onboardingComplete: false,
    profile: null,
    profileStatus: "idle",
    pendingInvitationCount: 0,
    isLoading: false,
    errorMessage: null,
    lastError: null,
  };
}

/**
 * Projects coordinator state into the published snapshot, enforcing the
 * signed-out invariant: no role or profile may leak past an account boundary.
 */
export function toSnapshot(state: SessionState): SessionSnapshot {
  const signedOut =
    state.identity === null &&
    (state.phase === "signed_out" || state.phase === "signing_out");

  const role = signedOut ? DEFAULT_ROLE : state.role;
  const profile = signedOut ? null : state.profile;

  return Object.freeze({
    ...state,
    role,
    profile,
    isSignedIn: state.identity !== null,
    needsOnboarding:
      state.identity !== null && state.isNewSignup && !state.onboardingComplete,
  });
}

/**
 * Identity-scoped key for the onboarding flag, so a restored flag never lets a
 * different account skip onboarding.
 */
export function onboardingKeyFor(identity: Pick<Identity, "uid">): string {
  return `hasCompletedOnboarding:${identity.uid}`;
}

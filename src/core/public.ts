// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Links: Used by features, ports and adapters via \@/core alias
 * @public
 */

export type {
  AuthErrorCode,
  DeletionReport,
  DeletionStep,
  Identity,
  ProfileLoadMode,
  ProfileLoadOutcome,
  ProfileStatus,
  RefreshedToken,
  SessionPhase,
  SessionResult,
  SessionSnapshot,
  SessionState,
  TokenInfo,
  UserProfile,
  UserRole,
} from "./session/public";
export {
  AUTH_ERROR_CODES,
  AUTH_ERROR_COPY,
  AuthError,
  backoffDelays,
  DEFAULT_ROLE,
  InvalidSessionTransitionError,
  isAuthError,
  isAuthErrorCode,
  isInvalidSessionTransitionError,
  isPendingPhase,
  isSignedInPhase,
  isTokenExpiringSoon,
  isValidTransition,
  MIN_PASSWORD_LENGTH,
  normalizeEmail,
  onboardingKeyFor,
  PROFILE_LOAD_BASE_DELAY_MS,
  PROFILE_LOAD_MAX_ATTEMPTS,
  parseRole,
  resolveObservedRole,
  signedOutState,
  TOKEN_EXPIRY_WARNING_MS,
  toSnapshot,
  USER_ROLES,
} from "./session/public";

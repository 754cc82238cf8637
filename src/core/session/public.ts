// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/session/public`
 * Purpose: Public API for the session domain.
 * Scope: Barrel export for session core domain. Does not expose internal implementation details.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Links: Imported by ports, features, and adapters
 * @public
 */

// Errors
export {
  AUTH_ERROR_CODES,
  AUTH_ERROR_COPY,
  AuthError,
  type AuthErrorCode,
  InvalidSessionTransitionError,
  isAuthError,
  isAuthErrorCode,
  isInvalidSessionTransitionError,
} from "./errors";
// Model types
export {
  DEFAULT_ROLE,
  type DeletionReport,
  type DeletionStep,
  type Identity,
  type ProfileLoadMode,
  type ProfileLoadOutcome,
  type ProfileStatus,
  type RefreshedToken,
  type SessionPhase,
  type SessionResult,
  type SessionSnapshot,
  type SessionState,
  type TokenInfo,
  USER_ROLES,
  type UserProfile,
  type UserRole,
} from "./model";
// Rules
export {
  backoffDelays,
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
} from "./rules";

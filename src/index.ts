// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `diamond-session`
 * Purpose: Package entry point - composition root, session coordinator, domain types and errors.
 * Scope: Re-exports only. Does not construct anything at import time.
 * Invariants: Named exports only, no export *
 * Side-effects: none
 * Links: bootstrap/container, features/session/public, features/media/public, core/public
 * @public
 */

export {
  type Container,
  createContainer,
  getContainer,
  resetContainer,
} from "./bootstrap/container";
export type {
  AuthErrorCode,
  DeletionReport,
  DeletionStep,
  Identity,
  ProfileLoadOutcome,
  ProfileStatus,
  RefreshedToken,
  SessionPhase,
  SessionResult,
  SessionSnapshot,
  TokenInfo,
  UserProfile,
  UserRole,
} from "./core/public";
export {
  AUTH_ERROR_COPY,
  AuthError,
  InvalidSessionTransitionError,
  isAuthError,
} from "./core/public";
export {
  isSignedUrlError,
  SignedUrlCache,
  SignedUrlError,
  type SignedUrlErrorCode,
  type SignedUrlOptions,
} from "./features/media/public";
export {
  type FormattedAuthError,
  formatAuthError,
  SessionCoordinator,
  type SessionCoordinatorConfig,
  type SessionCoordinatorDeps,
  type SessionListener,
  type SignInInput,
  type SignUpInput,
} from "./features/session/public";
export {
  EnvValidationError,
  parseServerEnv,
  type ServerEnv,
} from "./shared/env";

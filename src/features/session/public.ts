// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/session/public`
 * Purpose: Public API surface for the session feature - barrel export for stable feature boundaries.
 * Scope: Re-exports public types and functions; does not implement logic.
 * Invariants: All public exports must be stable.
 * Side-effects: none
 * Notes: Feature consumers should only import from this file, never from internal modules.
 * Links: Part of hexagonal architecture boundary enforcement
 * @public
 */

export { toAuthError } from "./errors";
export {
  type AccountDeletionDeps,
  type AccountDeletionOutcome,
  deleteAccountCascade,
} from "./services/accountDeletion";
export {
  loadProfileWithRetry,
  type ProfileFetchResult,
  type ProfileLoadPolicy,
} from "./services/profileLoader";
export { SerialQueue } from "./services/serialQueue";
export {
  SessionCoordinator,
  type SessionCoordinatorConfig,
  type SessionCoordinatorDeps,
  type SessionListener,
  type SignInInput,
  type SignUpInput,
} from "./services/sessionCoordinator";
export {
  type FormattedAuthError,
  formatAuthError,
} from "./utils/formatAuthError";

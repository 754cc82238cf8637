// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/session-caches`
 * Purpose: Session-scoped secondary caches cleared at every account boundary.
 * Scope: Opaque side effects invoked on sign-in, sign-out and deletion. Does not own session state.
 * Invariants: Clearing is idempotent; nothing cached here may survive into another account's session.
 * Side-effects: none (interface definition only)
 * Links: Implemented by DrizzleSessionCaches; used by SessionCoordinator
 * @public
 */

export interface SessionCaches {
  clearBiometricCredentials(): Promise<void>;
  clearUploadQueue(): Promise<void>;
  clearSignedUrls(): Promise<void>;
  setAnalyticsIdentity(uid: string): Promise<void>;
  resetAnalyticsIdentity(): Promise<void>;
}

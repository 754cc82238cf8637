// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/credential-provider`
 * Purpose: Credential provider port - account creation, authentication, auth-state push notifications, tokens.
 * Scope: Defines the contract the session coordinator consumes. Does not implement provider calls.
 * Invariants:
 * - onAuthStateChange fires on every sign-in/out, including ones triggered through this port
 * - Failures are thrown as CredentialProviderPortError with a taxonomy reason already mapped
 * Side-effects: none (interface definition only)
 * Links: Implemented by FirebaseCredentialProvider and InMemoryCredentialProvider; used by SessionCoordinator
 * @public
 */

import type { AuthErrorCode, Identity, TokenInfo } from "@/core";

export type AuthStateListener = (identity: Identity | null) => void;

export type Unsubscribe = () => void;

/**
 * Port-level error thrown by credential adapters.
 * `reason` is the taxonomy member; `providerCode` is the provider's native code.
 */
export class CredentialProviderPortError extends Error {
  constructor(
    public readonly reason: AuthErrorCode,
    public readonly providerCode: string,
    message: string
  ) {
    super(message);
    this.name = "CredentialProviderPortError";
  }
}

export function isCredentialProviderPortError(
  error: unknown
): error is CredentialProviderPortError {
  return (
    error instanceof Error && error.name === "CredentialProviderPortError"
  );
}

export interface CredentialProvider {
  /** Credential already established in this process (e.g. restored from the provider's own persistence) */
  currentIdentity(): Identity | null;

  createAccount(email: string, password: string): Promise<Identity>;

  authenticate(email: string, password: string): Promise<Identity>;

  /** Sets the display name on the current credential and returns the updated identity */
  updateDisplayName(displayName: string): Promise<Identity>;

  signOut(): Promise<void>;

  sendPasswordReset(email: string): Promise<void>;

  onAuthStateChange(listener: AuthStateListener): Unsubscribe;

  refreshToken(force: boolean): Promise<TokenInfo>;

  deleteCurrentAccount(): Promise<void>;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/firebase/auth-errors`
 * Purpose: Maps Firebase Auth error codes onto the authentication error taxonomy.
 * Scope: Pure mapping to CredentialProviderPortError. Does not retry or log.
 * Invariants: Unknown codes map to UNKNOWN with the provider message preserved; non-Firebase errors map to UNKNOWN.
 * Side-effects: none
 * Links: Used by FirebaseCredentialProvider
 * @internal
 */

import { FirebaseError } from "firebase/app";

import type { AuthErrorCode } from "@/core";
import { CredentialProviderPortError } from "@/ports";

const FIREBASE_AUTH_CODES: ReadonlyMap<string, AuthErrorCode> = new Map([
  ["auth/invalid-credential", "INVALID_CREDENTIALS"],
  ["auth/invalid-login-credentials", "INVALID_CREDENTIALS"],
  ["auth/wrong-password", "INVALID_CREDENTIALS"],
  ["auth/user-not-found", "INVALID_CREDENTIALS"],
  ["auth/invalid-email", "INVALID_CREDENTIALS"],
  ["auth/weak-password", "WEAK_PASSWORD"],
  ["auth/email-already-in-use", "EMAIL_IN_USE"],
  ["auth/user-disabled", "ACCOUNT_DISABLED"],
  ["auth/too-many-requests", "RATE_LIMITED"],
  ["auth/network-request-failed", "NETWORK_UNAVAILABLE"],
]);

export function authErrorCodeFor(providerCode: string): AuthErrorCode {
  return FIREBASE_AUTH_CODES.get(providerCode) ?? "UNKNOWN";
}

export function mapFirebaseAuthError(
  error: unknown
): CredentialProviderPortError {
  if (error instanceof CredentialProviderPortError) return error;

  if (error instanceof FirebaseError) {
    return new CredentialProviderPortError(
      authErrorCodeFor(error.code),
      error.code,
      error.message
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CredentialProviderPortError("UNKNOWN", "unknown", message);
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/session/errors`
 * Purpose: Translate credential and profile port errors into the authentication error taxonomy.
 * Scope: Provides toAuthError; does not call ports or adapters.
 * Invariants: Pure function, no side effects, no I/O; anything unrecognised becomes UNKNOWN with its message.
 * Side-effects: none
 * Links: src/features/session/public.ts
 * @public
 */

import { AuthError, isAuthError } from "@/core";
import { isCredentialProviderPortError, isProfileStorePortError } from "@/ports";

export function toAuthError(error: unknown): AuthError {
  if (isAuthError(error)) {
    return error;
  }

  if (isCredentialProviderPortError(error)) {
    return new AuthError(error.reason, error.message);
  }

  if (isProfileStorePortError(error)) {
    return new AuthError("UNKNOWN", error.message);
  }

  if (error instanceof Error) {
    return new AuthError("UNKNOWN", error.message);
  }

  return new AuthError("UNKNOWN", String(error));
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/media/errors`
 * Purpose: Errors raised while obtaining signed media URLs.
 * Scope: Error class and guard. Does not call the issuer.
 * Invariants: code is one of INVALID_RESPONSE, INVALID_EXPIRATION, ISSUER_FAILED; issuer failures keep the original error as cause.
 * Side-effects: none
 * Links: src/features/media/public.ts
 * @public
 */

export type SignedUrlErrorCode =
  | "INVALID_RESPONSE"
  | "INVALID_EXPIRATION"
  | "ISSUER_FAILED";

export class SignedUrlError extends Error {
  constructor(
    public readonly code: SignedUrlErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SignedUrlError";
  }
}

export function isSignedUrlError(error: unknown): error is SignedUrlError {
  return error instanceof Error && error.name === "SignedUrlError";
}

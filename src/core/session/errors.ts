// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/session/errors`
 * Purpose: Authentication error taxonomy and session domain errors.
 * Scope: Fixed, finite taxonomy with user-facing copy. Does not map provider codes (adapters do) or retry anything.
 * Invariants: Every AuthErrorCode has a message; UNKNOWN keeps the provider's raw message; no taxonomy member is retried automatically.
 * Side-effects: none (error definitions only)
 * Notes: Feature layer translates port errors into AuthError; UI displays userMessage.
 * Links: Used by features/session, adapters/server/firebase
 * @public
 */

import type { SessionPhase } from "./model";

export type AuthErrorCode =
  | "INVALID_CREDENTIALS"
  | "WEAK_PASSWORD"
  | "EMAIL_IN_USE"
  | "ACCOUNT_DISABLED"
  | "RATE_LIMITED"
  | "NETWORK_UNAVAILABLE"
  | "UNKNOWN";

export const AUTH_ERROR_CODES: readonly AuthErrorCode[] = [
  "INVALID_CREDENTIALS",
  "WEAK_PASSWORD",
  "EMAIL_IN_USE",
  "ACCOUNT_DISABLED",
  "RATE_LIMITED",
  "NETWORK_UNAVAILABLE",
  "UNKNOWN",
];

interface AuthErrorCopy {
  message: string;
  suggestion: string | null;
}

export const AUTH_ERROR_COPY: Readonly<Record<AuthErrorCode, AuthErrorCopy>> =
  {
    INVALID_CREDENTIALS: {
      message: "Invalid credentials. Please check your email and password.",
      suggestion:
        "Double-check your password or use 'Forgot Password' to reset it.",
    },
    WEAK_PASSWORD: {
      message: "Your password must be at least 6 characters long.",
      suggestion:
        "Use a combination of letters, numbers, and special characters.",
    },
    EMAIL_IN_USE: {
      message: "This email address is already associated with an account.",
      suggestion:
        "Try signing in instead, or use password reset if you forgot your password.",
    },
    ACCOUNT_DISABLED: {
      message: "This account has been disabled. Please contact support.",
      suggestion: null,
    },
    RATE_LIMITED: {
      message: "Too many attempts. Please wait a moment before trying again.",
      suggestion: "Wait 5-10 minutes before attempting to sign in again.",
    },
    NETWORK_UNAVAILABLE: {
      message: "Network error. Please check your connection.",
      suggestion: null,
    },
    UNKNOWN: {
      message: "Authentication failed. Please try again.",
      suggestion: null,
    },
  };

/**
 * Domain error for any user-initiated authentication failure.
 */
export class AuthError extends Error {
  public readonly userMessage: string;
  public readonly suggestion: string | null;

  constructor(
    /** Taxonomy member */
    public readonly code: AuthErrorCode,
    /** Provider's own message, kept for diagnostics (always set for UNKNOWN when available) */
    public readonly rawMessage: string | null = null
  ) {
    const copy = AUTH_ERROR_COPY[code];
    super(rawMessage ? `${code}: ${rawMessage}` : `${code}: ${copy.message}`);
    this.name = "AuthError";
    this.userMessage = copy.message;
    this.suggestion = copy.suggestion;
  }
}

/**
 * Thrown when the coordinator is asked to move between phases the state machine does not allow.
 * Indicates a programming error, never a user-facing failure.
 */
export class InvalidSessionTransitionError extends Error {
  public readonly code = "INVALID_SESSION_TRANSITION" as const;

  constructor(
    public readonly from: SessionPhase,
    public readonly to: SessionPhase
  ) {
    super(`Invalid session transition: ${from} → ${to}`);
    this.name = "InvalidSessionTransitionError";
  }
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

export function isAuthErrorCode(value: unknown): value is AuthErrorCode {
  return (
    typeof value === "string" &&
    AUTH_ERROR_CODES.some((code) => code === value)
  );
}

export function isInvalidSessionTransitionError(
  error: unknown
): error is InvalidSessionTransitionError {
  return (
    error instanceof Error && error.name === "InvalidSessionTransitionError"
  );
}

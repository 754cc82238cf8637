// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Credentials, tokens and signed URLs never reach log output.
 * Side-effects: none
 * Links: Imported by logger module
 * @public
 */

export const REDACT_PATHS = [
  // Credentials
  "password",
  "*.password",
  "newPassword",
  // Tokens & keys
  "token",
  "*.token",
  "idToken",
  "refreshToken",
  "apiKey",
  "FIREBASE_API_KEY",
  // Signed media URLs grant access until they expire
  "signedURL",
  "url",
];

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/session/utils/formatAuthError`
 * Purpose: Maps any authentication failure to display copy.
 * Scope: Pure error mapping utility. Does not handle UI rendering or logging.
 * Invariants: Never returns raw provider text as userMessage; debug field for logging only.
 * Side-effects: none
 * Links: core/session/errors AUTH_ERROR_COPY
 * @public
 */

import type { AuthErrorCode } from "@/core";

import { toAuthError } from "../errors";

export interface FormattedAuthError {
  code: AuthErrorCode;
  userMessage: string;
  suggestion: string | null;
  debug?: string; // Provider message for logging only - NEVER render in UI
}

export function formatAuthError(error: unknown): FormattedAuthError {
  const authError = toAuthError(error);

  return {
    code: authError.code,
    userMessage: authError.userMessage,
    suggestion: authError.suggestion,
    ...(authError.rawMessage ? { debug: authError.rawMessage } : {}),
  };
}

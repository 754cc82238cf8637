// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define full payload schemas (see events/session.ts).
 * Invariants: All event names registered here; logEvent() enforces base fields (opId always).
 * Side-effects: none
 * Notes: Use EVENT_NAMES.* constants when logging.
 * Links: Used by logEvent(); consumed by features and adapters.
 * @public
 */

// ============================================================================
// Event Name Registry (as const)
// ============================================================================

export const EVENT_NAMES = {
  // Session Domain
  SESSION_STARTED: "session.started",
  SESSION_STATE_TRANSITION: "session.state_transition",
  SESSION_SIGN_UP_STARTED: "session.sign_up_started",
  SESSION_SIGN_UP_COMPLETED: "session.sign_up_completed",
  SESSION_SIGN_IN_STARTED: "session.sign_in_started",
  SESSION_SIGN_IN_COMPLETED: "session.sign_in_completed",
  SESSION_AUTH_FAILED: "session.auth_failed",
  SESSION_AUTH_PUSH_RECEIVED: "session.auth_push_received",
  SESSION_SIGNED_OUT: "session.signed_out",
  SESSION_ONBOARDING_COMPLETED: "session.onboarding_completed",
  SESSION_PASSWORD_RESET_SENT: "session.password_reset_sent",
  SESSION_TOKEN_REFRESHED: "session.token_refreshed",
  SESSION_COACH_INVITATIONS_FOUND: "session.coach_invitations_found",
  SESSION_CACHE_WRITE_FAILED: "session.cache_write_failed",

  // Profile reconciliation
  SESSION_PROFILE_LOAD_RETRY: "session.profile_load_retry",
  SESSION_PROFILE_LOADED: "session.profile_loaded",
  SESSION_PROFILE_REPAIRED: "session.profile_repaired",
  SESSION_PROFILE_UNAVAILABLE: "session.profile_unavailable",
  SESSION_PROFILE_LOAD_CANCELLED: "session.profile_load_cancelled",
  SESSION_PROFILE_WRITE_FAILED: "session.profile_write_failed",

  // Account deletion
  SESSION_ACCOUNT_DELETION_STEP_FAILED: "session.account_deletion_step_failed",
  SESSION_ACCOUNT_DELETED: "session.account_deleted",

  // Media
  MEDIA_SIGNED_URL_CACHE_HIT: "media.signed_url_cache_hit",
  MEDIA_SIGNED_URL_ISSUED: "media.signed_url_issued",

  // Adapter Events
  ADAPTER_BLOB_STORAGE_DELETED: "adapter.blob_storage.deleted",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

// ============================================================================
// Base Field Enforcement (for logEvent() helper)
// ============================================================================

/**
 * Required base fields for all events.
 * opId correlates every log line emitted by one coordinator operation.
 */
export interface EventBase {
  opId: string;
}

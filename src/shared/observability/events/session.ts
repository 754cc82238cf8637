// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events.session`
 * Purpose: Strict payload schemas for session domain events.
 * Scope: Type definitions for structured session events. Does not implement event creation.
 * Invariants: All events extend EventBase (opId required).
 * Side-effects: none
 * Links: Uses EventBase from events/index.ts; exported via observability/index.ts.
 * @public
 */

export interface SessionStateTransitionEvent {
  event: "session.state_transition";
  opId: string;
  fromPhase: string;
  toPhase: string;
  uid?: string | undefined;
}

export interface SessionProfileLoadRetryEvent {
  event: "session.profile_load_retry";
  opId: string;
  uid: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  reason: "absent" | "read_error";
}

export interface SessionAccountDeletionStepFailedEvent {
  event: "session.account_deletion_step_failed";
  opId: string;
  uid: string;
  step: string;
  error: string;
}

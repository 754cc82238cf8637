// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/session/services/profileLoader`
 * Purpose: Bounded, abortable retry loop for reading the remote profile.
 * Scope: Reads with doubling backoff and classifies the outcome. Does not write, repair, or touch session state.
 * Invariants:
 * - At most maxAttempts reads; delays are backoffDelays(maxAttempts, baseDelayMs)
 * - No read follows an abort; an abort during a sleep ends the loop as cancelled
 * - absent only when every read returned null; any read error makes the outcome unavailable
 * Side-effects: IO (profile reads, timers via Delay)
 * Links: Called by SessionCoordinator.reconcileProfile
 * @internal
 */

import { backoffDelays, type UserProfile } from "@/core";
import { type Delay, isDelayAbortedError, type ProfileStore } from "@/ports";
import {
  EVENT_NAMES,
  type Logger,
  logEvent,
  type SessionProfileLoadRetryEvent,
} from "@/shared/observability";

export interface ProfileLoadPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface ProfileLoaderDeps {
  profiles: ProfileStore;
  delay: Delay;
  logger: Logger;
}

export type ProfileFetchResult =
  | { status: "found"; profile: UserProfile; attempts: number }
  | { status: "absent"; attempts: number }
  | { status: "unavailable"; attempts: number; lastError: unknown }
  | { status: "cancelled"; attempts: number };

export async function loadProfileWithRetry(
  deps: ProfileLoaderDeps,
  uid: string,
  policy: ProfileLoadPolicy,
  context: { signal: AbortSignal; opId: string }
): Promise<ProfileFetchResult> {
  const { signal, opId } = context;
  const delays = backoffDelays(policy.maxAttempts, policy.baseDelayMs);
  let lastError: unknown = null;
  let sawError = false;
  let attempts = 0;

  while (attempts < policy.maxAttempts) {
    if (signal.aborted) return { status: "cancelled", attempts };

    attempts += 1;
    let reason: "absent" | "read_error";
    try {
      const profile = await deps.profiles.readProfile(uid);
      if (signal.aborted) return { status: "cancelled", attempts };
      if (profile) return { status: "found", profile, attempts };
      reason = "absent";
    } catch (error) {
      if (signal.aborted) return { status: "cancelled", attempts };
      sawError = true;
      lastError = error;
      reason = "read_error";
    }

    const delayMs = delays[attempts - 1];
    if (delayMs === undefined) break;

    const retry: SessionProfileLoadRetryEvent = {
      event: EVENT_NAMES.SESSION_PROFILE_LOAD_RETRY,
      opId,
      uid,
      attempt: attempts,
      maxAttempts: policy.maxAttempts,
      delayMs,
      reason,
    };
    logEvent(
      deps.logger,
      retry.event,
      { ...retry },
      "profile not readable yet, backing off"
    );

    try {
      await deps.delay.sleep(delayMs, signal);
    } catch (error) {
      if (isDelayAbortedError(error) || signal.aborted) {
        return { status: "cancelled", attempts };
      }
      throw error;
    }
  }

  return sawError
    ? { status: "unavailable", attempts, lastError }
    : { status: "absent", attempts };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/delay`
 * Purpose: Abortable timer used between profile-load attempts.
 * Scope: Sleep for a duration or until aborted. Does not schedule recurring work.
 * Invariants: Rejects with DelayAbortedError when the signal aborts, never resolves after abort.
 * Side-effects: none (interface definition only)
 * Notes: Enables deterministic backoff tests without fake timers.
 * Links: Implemented by TimerDelay; fakes in tests/_fakes
 * @public
 */

export class DelayAbortedError extends Error {
  constructor() {
    super("Delay aborted");
    this.name = "DelayAbortedError";
  }
}

export function isDelayAbortedError(error: unknown): error is DelayAbortedError {
  return error instanceof Error && error.name === "DelayAbortedError";
}

export interface Delay {
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

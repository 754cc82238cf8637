// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time source for token expiry checks, cache TTLs and local timestamps.
 * Scope: Current time as an ISO string or epoch millis. Does not sleep (see Delay).
 * Invariants: now() is ISO 8601; nowMs() is the same instant as epoch millis
 * Side-effects: none (interface only)
 * Links: Implemented by SystemClock; FakeClock in tests
 * @public
 */

export interface Clock {
  now(): string;
  /** Epoch millis, for expiry arithmetic */
  nowMs(): number;
}

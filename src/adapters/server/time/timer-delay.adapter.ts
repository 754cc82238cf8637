// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/time/timer-delay`
 * Purpose: Abortable sleep backed by Node timers.
 * Scope: Single delay per call. Does not retry or schedule.
 * Invariants: An aborted signal rejects with DelayAbortedError, before or during the wait.
 * Side-effects: IO (timers)
 * Links: Implements Delay port
 * @internal
 */

import { setTimeout as sleep } from "node:timers/promises";

import { type Delay, DelayAbortedError } from "@/ports";

export class TimerDelay implements Delay {
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new DelayAbortedError();
    try {
      await sleep(ms, undefined, signal ? { signal } : undefined);
    } catch (error) {
      if (signal?.aborted) throw new DelayAbortedError();
      throw error;
    }
  }
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/session/services/serialQueue`
 * Purpose: One-at-a-time task runner for credential operations and provider pushes.
 * Scope: Orders async tasks by submission. Does not cancel tasks (callers check their abort scope).
 * Invariants: A task starts only after every earlier task settled; a rejected task does not stall later ones.
 * Side-effects: none
 * @internal
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Resolves once every task submitted so far, and any submitted while waiting, has settled */
  async idle(): Promise<void> {
    let observed: Promise<void>;
    do {
      observed = this.tail;
      await observed;
    } while (observed !== this.tail);
  }
}

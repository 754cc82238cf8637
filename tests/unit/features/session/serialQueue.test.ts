// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/session/serialQueue.test`
 * Purpose: Unit tests for the one-at-a-time task runner.
 * Scope: Ordering, failure isolation and idle detection. Does NOT involve session state.
 * Invariants: A task never starts before the previous one settled.
 * Side-effects: none
 * Links: src/features/session/services/serialQueue.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { SerialQueue } from "@/features/session/public";

const flush = (): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, 0);
  });

describe("features/session/serialQueue", () => {
  it("starts each task only after the previous one settled", async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = queue.run(async () => {
      events.push("first:start");
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      events.push("first:end");
      return 1;
    });
    const second = queue.run(async () => {
      events.push("second:start");
      return 2;
    });

    await flush();
    expect(events).toEqual(["first:start"]);

    releaseFirst();
    await expect(second).resolves.toBe(2);
    await expect(first).resolves.toBe(1);
    expect(events).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("keeps running after a task rejects", async () => {
    const queue = new SerialQueue();

    const failing = queue.run(async () => {
      throw new Error("boom");
    });
    const next = queue.run(async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("idle() waits for tasks enqueued while draining", async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    void queue.run(async () => {
      events.push("outer");
      void queue.run(async () => {
        events.push("inner");
      });
    });

    await queue.idle();
    expect(events).toEqual(["outer", "inner"]);
  });

  it("idle() resolves immediately on an empty queue", async () => {
    await expect(new SerialQueue().idle()).resolves.toBeUndefined();
  });
});

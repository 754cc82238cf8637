// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/session-harness`
 * Purpose: Builds a SessionCoordinator over in-memory adapters and records every published snapshot.
 * Scope: Test wiring only. Does NOT start the coordinator (tests decide when to call start()).
 * Invariants: Fresh fakes per harness; logger is silent.
 * Side-effects: none
 * Links: features/session/services/sessionCoordinator.ts
 * @public
 */

import {
  FakeBlobStorage,
  FakeCredentialProvider,
  FakeInvitationDirectory,
  FakeProfileStore,
} from "@/adapters/test";
import type { SessionSnapshot } from "@/core";
import { SessionCoordinator } from "@/features/session/public";
import type { Delay } from "@/ports";
import { makeNoopLogger } from "@/shared/observability";

import { RecordingDelay } from "./delays";
import { FakeClock } from "./fake-clock";
import {
  InMemoryMirror,
  InMemoryPreferences,
  RecordingSessionCaches,
} from "./local-store";

export const TEST_PASSWORD = "test-secret";

export interface SessionHarnessOptions<D extends Delay> {
  delay?: D;
  maxAttempts?: number;
  baseDelayMs?: number;
  /** Lifetime of tokens the fake provider issues */
  tokenTtlMs?: number;
}

export interface SessionHarness<D extends Delay = RecordingDelay> {
  coordinator: SessionCoordinator;
  credentials: FakeCredentialProvider;
  profiles: FakeProfileStore;
  preferences: InMemoryPreferences;
  mirror: InMemoryMirror;
  caches: RecordingSessionCaches;
  blobs: FakeBlobStorage;
  invitations: FakeInvitationDirectory;
  delay: D;
  clock: FakeClock;
  snapshots: SessionSnapshot[];
}

export function makeSessionHarness(): SessionHarness;
export function makeSessionHarness<D extends Delay>(
  options: SessionHarnessOptions<D> & { delay: D }
): SessionHarness<D>;
export function makeSessionHarness(
  options: Omit<SessionHarnessOptions<RecordingDelay>, "delay">
): SessionHarness;
export function makeSessionHarness(
  options: SessionHarnessOptions<Delay> = {}
): SessionHarness<Delay> {
  const clock = new FakeClock();
  const credentials = new FakeCredentialProvider({
    clock,
    ...(options.tokenTtlMs !== undefined
      ? { tokenTtlMs: options.tokenTtlMs }
      : {}),
  });
  const profiles = new FakeProfileStore(clock);
  const preferences = new InMemoryPreferences();
  const mirror = new InMemoryMirror();
  const caches = new RecordingSessionCaches();
  const blobs = new FakeBlobStorage();
  const invitations = new FakeInvitationDirectory();
  const delay = options.delay ?? new RecordingDelay();

  const coordinator = new SessionCoordinator(
    {
      credentials,
      profiles,
      preferences,
      mirror,
      caches,
      blobs,
      invitations,
      delay,
      clock,
      logger: makeNoopLogger(),
    },
    {
      profileLoad: {
        maxAttempts: options.maxAttempts ?? 5,
        baseDelayMs: options.baseDelayMs ?? 500,
      },
    }
  );

  const snapshots: SessionSnapshot[] = [];
  coordinator.subscribe((snapshot) => snapshots.push(snapshot));

  return {
    coordinator,
    credentials,
    profiles,
    preferences,
    mirror,
    caches,
    blobs,
    invitations,
    delay,
    clock,
    snapshots,
  };
}

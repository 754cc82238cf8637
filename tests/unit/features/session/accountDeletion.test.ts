// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/session/accountDeletion.test`
 * Purpose: Unit tests for the account deletion cascade.
 * Scope: Step order, failure reporting and credential-last semantics. Does NOT test session state (coordinator tests do).
 * Invariants: Every step runs once even after earlier failures; only the credential step decides success.
 * Side-effects: none
 * Links: src/features/session/services/accountDeletion.ts
 * @internal
 */

import {
  InMemoryMirror,
  makeCaptureLogger,
  RecordingSessionCaches,
  TEST_PASSWORD,
} from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import {
  FakeBlobStorage,
  FakeCredentialProvider,
  FakeProfileStore,
} from "@/adapters/test";
import type { Identity } from "@/core";
import {
  type AccountDeletionDeps,
  deleteAccountCascade,
} from "@/features/session/public";
import { isCredentialProviderPortError } from "@/ports";
import { makeNoopLogger } from "@/shared/observability";

interface Fixture {
  deps: AccountDeletionDeps;
  credentials: FakeCredentialProvider;
  profiles: FakeProfileStore;
  blobs: FakeBlobStorage;
  mirror: InMemoryMirror;
  caches: RecordingSessionCaches;
  identity: Identity;
}

async function makeFixture(): Promise<Fixture> {
  const credentials = new FakeCredentialProvider();
  const profiles = new FakeProfileStore();
  const blobs = new FakeBlobStorage();
  const mirror = new InMemoryMirror();
  const caches = new RecordingSessionCaches();

  credentials.seedAccount({ email: "athlete@example.com", password: TEST_PASSWORD });
  const identity = credentials.restoreSession("athlete@example.com");
  profiles.seed({ uid: identity.uid, email: "athlete@example.com" });
  blobs.seed(identity.uid, ["swing.mov", "swing.jpg"]);
  blobs.seed("user-99", ["other.mov"]);
  await mirror.upsert({
    uid: identity.uid,
    email: "athlete@example.com",
    displayName: null,
    role: "athlete",
    isPremium: false,
    createdAt: null,
  });

  return {
    deps: { credentials, profiles, blobs, mirror, caches, logger: makeNoopLogger() },
    credentials,
    profiles,
    blobs,
    mirror,
    caches,
    identity,
  };
}

describe("features/session/accountDeletion", () => {
  it("removes everything the account owns, credential last", async () => {
    const f = await makeFixture();

    const outcome = await deleteAccountCascade(f.deps, f.identity, "op-test");

    expect(outcome).toEqual({
      report: { uid: "user-1", failedSteps: [] },
      credentialError: null,
    });
    expect(f.blobs.list()).toEqual(["athlete_videos/user-99/other.mov"]);
    expect(f.profiles.get("user-1")).toBeNull();
    expect(f.caches.calls).toEqual(["clearBiometricCredentials"]);
    expect(await f.mirror.get("user-1")).toBeNull();
    expect(f.credentials.calls).toEqual(["deleteCurrentAccount"]);
    expect(f.credentials.hasAccount("athlete@example.com")).toBe(false);
  });

  it("continues past failed steps and reports them", async () => {
    const f = await makeFixture();
    f.blobs.failWith(new Error("storage offline"));
    f.profiles.failDeletions();
    f.caches.failing.add("clearBiometricCredentials");

    const outcome = await deleteAccountCascade(f.deps, f.identity, "op-test");

    expect(outcome.report.failedSteps).toEqual([
      "storage",
      "profile",
      "biometric",
    ]);
    expect(outcome.credentialError).toBeNull();
    expect(await f.mirror.get("user-1")).toBeNull();
    expect(f.credentials.hasAccount("athlete@example.com")).toBe(false);
  });

  it("logs a failed step as a structured warning", async () => {
    const f = await makeFixture();
    const { logger, lines } = makeCaptureLogger();
    f.blobs.failWith(new Error("storage offline"));

    await deleteAccountCascade({ ...f.deps, logger }, f.identity, "op-test");

    expect(lines).toEqual([
      {
        level: 40,
        event: "session.account_deletion_step_failed",
        opId: "op-test",
        uid: "user-1",
        step: "storage",
        error: "storage offline",
        msg: "account deletion step failed, continuing",
      },
    ]);
  });

  it("reports a credential failure with its error", async () => {
    const f = await makeFixture();
    f.credentials.failNext(
      "deleteCurrentAccount",
      "RATE_LIMITED",
      "auth/too-many-requests",
      "Too many requests"
    );

    const outcome = await deleteAccountCascade(f.deps, f.identity, "op-test");

    expect(outcome.report.failedSteps).toEqual(["credential"]);
    expect(isCredentialProviderPortError(outcome.credentialError)).toBe(true);
    if (isCredentialProviderPortError(outcome.credentialError)) {
      expect(outcome.credentialError.reason).toBe("RATE_LIMITED");
    }
    expect(f.credentials.hasAccount("athlete@example.com")).toBe(true);
    expect(f.profiles.get("user-1")).toBeNull();
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/session/sessionCoordinator.lifecycle.test`
 * Purpose: Session restore, onboarding, tokens, password reset and observation on the coordinator.
 * Scope: Coordinator over in-memory adapters. Does NOT use Firebase or SQLite.
 * Invariants:
 *   - A restored credential is adopted as an existing account
 *   - The onboarding flag belongs to one identity
 *   - Listener failures never break a commit
 * Side-effects: none
 * Links: src/features/session/services/sessionCoordinator.ts
 * @internal
 */

import {
  FAKE_CLOCK_START,
  makeSessionHarness,
  TEST_PASSWORD,
} from "@tests/_fakes";
import { describe, expect, it } from "vitest";

const ATHLETE = { email: "athlete@example.com", password: TEST_PASSWORD };

describe("SessionCoordinator lifecycle", () => {
  describe("start()", () => {
    it("restores a credential the provider already holds", async () => {
      const h = makeSessionHarness();
      h.credentials.seedAccount(ATHLETE);
      h.credentials.restoreSession(ATHLETE.email);
      h.profiles.seed({ uid: "user-1", email: ATHLETE.email, role: "coach" });
      await h.mirror.upsert({
        uid: "user-1",
        email: ATHLETE.email,
        displayName: null,
        role: "coach",
        isPremium: false,
        createdAt: null,
      });
      await h.preferences.set("hasCompletedOnboarding:user-1", "true");

      await h.coordinator.start();
      await h.coordinator.whenIdle();

      const snapshot = h.coordinator.getSnapshot();
      expect(snapshot.phase).toBe("signed_in_existing");
      expect(snapshot.identity?.uid).toBe("user-1");
      expect(snapshot.role).toBe("coach");
      expect(snapshot.onboardingComplete).toBe(true);
      expect(snapshot.profileStatus).toBe("loaded");
      expect(snapshot.isLoading).toBe(false);
      expect(h.credentials.listenerCount).toBe(1);
    });

    it("falls back to the persisted role when the mirror is empty", async () => {
      const h = makeSessionHarness();
      h.credentials.seedAccount(ATHLETE);
      h.credentials.restoreSession(ATHLETE.email);
      await h.preferences.set("userRole", "coach");
      // Reads fail so the restored role stays observable
      h.profiles.failReads(5);

      await h.coordinator.start();
      await h.coordinator.whenIdle();

      const snapshot = h.coordinator.getSnapshot();
      expect(snapshot.role).toBe("coach");
      expect(snapshot.profileStatus).toBe("unavailable");
    });

    it("does not let another account's onboarding flag apply", async () => {
      const h = makeSessionHarness();
      h.credentials.seedAccount(ATHLETE);
      h.credentials.restoreSession(ATHLETE.email);
      h.profiles.seed({ uid: "user-1", email: ATHLETE.email });
      await h.preferences.set("hasCompletedOnboarding:user-9", "true");

      await h.coordinator.start();
      await h.coordinator.whenIdle();

      expect(h.coordinator.getSnapshot().onboardingComplete).toBe(false);
    });

    it("stays signed out without a stored credential", async () => {
      const h = makeSessionHarness();

      await h.coordinator.start();
      await h.coordinator.whenIdle();

      expect(h.coordinator.getSnapshot().phase).toBe("signed_out");
      expect(h.snapshots).toEqual([]);
    });

    it("stop() unsubscribes from provider pushes", async () => {
      const h = makeSessionHarness();
      await h.coordinator.start();

      h.coordinator.stop();

      expect(h.credentials.listenerCount).toBe(0);
    });
  });

  describe("onboarding", () => {
    it("completes onboarding for the signed-up identity", async () => {
      const h = makeSessionHarness();
      await h.coordinator.signUp(ATHLETE);
      expect(h.coordinator.getSnapshot().needsOnboarding).toBe(true);

      await h.coordinator.completeOnboarding();

      const snapshot = h.coordinator.getSnapshot();
      expect(snapshot.phase).toBe("signed_in_existing");
      expect(snapshot.isNewSignup).toBe(false);
      expect(snapshot.onboardingComplete).toBe(true);
      expect(snapshot.needsOnboarding).toBe(false);
      expect(h.preferences.values.get("hasCompletedOnboarding:user-1")).toBe(
        "true"
      );
    });

    it("treats skipping like completing", async () => {
      const h = makeSessionHarness();
      await h.coordinator.signUp(ATHLETE);

      await h.coordinator.skipOnboarding();

      expect(h.coordinator.getSnapshot().needsOnboarding).toBe(false);
      expect(h.preferences.values.get("hasCompletedOnboarding:user-1")).toBe(
        "true"
      );
    });

    it("ignores onboarding calls without an identity", async () => {
      const h = makeSessionHarness();

      await h.coordinator.completeOnboarding();

      expect(h.snapshots).toEqual([]);
      expect(h.preferences.values.size).toBe(0);
    });
  });

  describe("loadProfile()", () => {
    it("reports unavailable without an identity", async () => {
      const h = makeSessionHarness();

      await expect(h.coordinator.loadProfile()).resolves.toEqual({
        status: "unavailable",
      });
      expect(h.profiles.readCount).toBe(0);
    });

    it("reloads the profile for an existing account", async () => {
      const h = makeSessionHarness();
      h.credentials.seedAccount(ATHLETE);
      h.profiles.seed({ uid: "user-1", email: ATHLETE.email });
      await h.coordinator.signIn(ATHLETE);
      h.profiles.seed({
        uid: "user-1",
        email: ATHLETE.email,
        role: "coach",
        isPremium: true,
      });

      const outcome = await h.coordinator.loadProfile();

      expect(outcome.status).toBe("loaded");
      const snapshot = h.coordinator.getSnapshot();
      expect(snapshot.role).toBe("coach");
      expect(snapshot.profile?.isPremium).toBe(true);
    });
  });

  describe("refreshToken()", () => {
    it("returns the token with its expiry", async () => {
      const h = makeSessionHarness();
      h.credentials.seedAccount(ATHLETE);
      h.profiles.seed({ uid: "user-1", email: ATHLETE.email });
      await h.coordinator.signIn(ATHLETE);

      const result = await h.coordinator.refreshToken(true);

      expect(result).toEqual({
        status: "ok",
        value: {
          token: "test-token-user-1-1",
          issuedAt: FAKE_CLOCK_START,
          expiresAt: "2025-03-01T13:00:00.000Z",
          expiresSoon: false,
        },
      });
    });

    it("flags tokens that expire within five minutes", async () => {
      const h = makeSessionHarness({ tokenTtlMs: 4 * 60 * 1000 });
      h.credentials.seedAccount(ATHLETE);
      h.profiles.seed({ uid: "user-1", email: ATHLETE.email });
      await h.coordinator.signIn(ATHLETE);

      const result = await h.coordinator.refreshToken();

      expect(result.status === "ok" && result.value.expiresSoon).toBe(true);
    });

    it("fails when nobody is signed in", async () => {
      const h = makeSessionHarness();

      const result = await h.coordinator.refreshToken();

      expect(result.status).toBe("failed");
      if (result.status === "failed") {
        expect(result.error.code).toBe("UNKNOWN");
        expect(result.error.rawMessage).toBe("No user signed in");
      }
    });
  });

  describe("sendPasswordReset()", () => {
    it("sends to the normalized address", async () => {
      const h = makeSessionHarness();

      const result = await h.coordinator.sendPasswordReset(
        " Athlete@Example.com "
      );

      expect(result).toEqual({ status: "ok", value: undefined });
      expect(h.credentials.passwordResets).toEqual(["athlete@example.com"]);
    });

    it("surfaces a failure and clearError() removes it", async () => {
      const h = makeSessionHarness();
      h.credentials.failNext("sendPasswordReset", "RATE_LIMITED");

      const result = await h.coordinator.sendPasswordReset(ATHLETE.email);

      expect(result.status).toBe("failed");
      expect(h.coordinator.getSnapshot().errorMessage).toBe(
        "Too many attempts. Please wait a moment before trying again."
      );
      expect(h.coordinator.getSnapshot().isLoading).toBe(false);

      h.coordinator.clearError();

      expect(h.coordinator.getSnapshot().errorMessage).toBeNull();
      expect(h.coordinator.getSnapshot().lastError).toBeNull();
    });
  });

  describe("observation", () => {
    it("clearError() publishes nothing when there is no error", () => {
      const h = makeSessionHarness();

      h.coordinator.clearError();

      expect(h.snapshots).toEqual([]);
    });

    it("keeps notifying after a listener throws", async () => {
      const h = makeSessionHarness();
      h.coordinator.subscribe(() => {
        throw new Error("listener failed");
      });

      const result = await h.coordinator.signUp(ATHLETE);

      expect(result.status).toBe("ok");
      expect(h.snapshots.at(-1)?.phase).toBe("signed_in_new");
    });

    it("stops notifying after unsubscribe", async () => {
      const h = makeSessionHarness();
      const seen: string[] = [];
      const unsubscribe = h.coordinator.subscribe((s) => seen.push(s.phase));
      unsubscribe();

      await h.coordinator.signUp(ATHLETE);

      expect(seen).toEqual([]);
    });
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/session/rules.test`
 * Purpose: Unit tests for the session state machine, role resolution and backoff rules.
 * Scope: Pure functions only. Does NOT exercise the coordinator.
 * Invariants:
 *   - Signed-out snapshots never carry a non-default role or a profile
 *   - Signup window: local role beats the remote read
 * Side-effects: none
 * Links: src/core/session/rules.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  backoffDelays,
  DEFAULT_ROLE,
  isPendingPhase,
  isSignedInPhase,
  isTokenExpiringSoon,
  isValidTransition,
  normalizeEmail,
  onboardingKeyFor,
  parseRole,
  resolveObservedRole,
  type SessionState,
  signedOutState,
  toSnapshot,
  type UserProfile,
} from "@/core";

const PROFILE: UserProfile = {
  uid: "user-1",
  email: "coach@example.com",
  role: "coach",
  isPremium: true,
  displayName: "Casey",
  createdAt: "2025-01-01T00:00:00.000Z",
  updatedAt: "2025-01-02T00:00:00.000Z",
};

describe("core/session/rules", () => {
  describe("isValidTransition()", () => {
    it("allows the documented sign-up and sign-in paths", () => {
      expect(isValidTransition("signed_out", "signing_up")).toBe(true);
      expect(isValidTransition("signing_up", "signed_in_new")).toBe(true);
      expect(isValidTransition("signed_in_new", "signed_in_existing")).toBe(
        true
      );
      expect(isValidTransition("signed_out", "signing_in")).toBe(true);
      expect(isValidTransition("signing_in", "signed_in_existing")).toBe(true);
    });

    it("routes every sign-out through signing_out", () => {
      expect(isValidTransition("signed_in_existing", "signing_out")).toBe(true);
      expect(isValidTransition("signing_out", "signed_out")).toBe(true);
      expect(isValidTransition("signed_in_existing", "signed_out")).toBe(false);
      expect(isValidTransition("signed_in_new", "signed_out")).toBe(false);
    });

    it("rejects skipping the pending phase", () => {
      expect(isValidTransition("signed_out", "signed_in_new")).toBe(false);
      expect(isValidTransition("signing_out", "signed_in_existing")).toBe(
        false
      );
    });

    it("treats staying in place as allowed", () => {
      expect(isValidTransition("signing_in", "signing_in")).toBe(true);
    });
  });

  it("classifies pending and signed-in phases", () => {
    expect(isPendingPhase("signing_up")).toBe(true);
    expect(isPendingPhase("signing_out")).toBe(true);
    expect(isPendingPhase("signed_in_new")).toBe(false);
    expect(isSignedInPhase("signed_in_new")).toBe(true);
    expect(isSignedInPhase("signed_in_existing")).toBe(true);
    expect(isSignedInPhase("signed_out")).toBe(false);
  });

  describe("parseRole()", () => {
    it("accepts known roles", () => {
      expect(parseRole("coach")).toBe("coach");
      expect(parseRole("athlete")).toBe("athlete");
    });

    it("falls back to the default role", () => {
      expect(parseRole("admin")).toBe(DEFAULT_ROLE);
      expect(parseRole(null)).toBe("athlete");
      expect(parseRole(42)).toBe("athlete");
    });
  });

  describe("resolveObservedRole()", () => {
    it("keeps the local role during the signup window", () => {
      expect(
        resolveObservedRole({
          mode: "signup",
          isNewSignup: true,
          localRole: "coach",
          remoteRole: "athlete",
        })
      ).toBe("coach");
    });

    it("trusts the server for existing accounts", () => {
      expect(
        resolveObservedRole({
          mode: "existing",
          isNewSignup: true,
          localRole: "athlete",
          remoteRole: "coach",
        })
      ).toBe("coach");
    });

    it("trusts the server once the signup window has closed", () => {
      expect(
        resolveObservedRole({
          mode: "signup",
          isNewSignup: false,
          localRole: "coach",
          remoteRole: "athlete",
        })
      ).toBe("athlete");
    });
  });

  describe("backoffDelays()", () => {
    it("doubles from the base delay, one fewer than the attempts", () => {
      expect(backoffDelays(5, 500)).toEqual([500, 1000, 2000, 4000]);
      expect(backoffDelays(3, 10)).toEqual([10, 20]);
    });

    it("returns no delays for a single attempt", () => {
      expect(backoffDelays(1, 500)).toEqual([]);
    });
  });

  it("normalizes emails", () => {
    expect(normalizeEmail("  Coach@Example.COM ")).toBe("coach@example.com");
  });

  describe("isTokenExpiringSoon()", () => {
    const now = "2025-03-01T12:00:00.000Z";

    it("is true at exactly five minutes", () => {
      expect(isTokenExpiringSoon("2025-03-01T12:05:00.000Z", now)).toBe(true);
    });

    it("is false beyond five minutes", () => {
      expect(isTokenExpiringSoon("2025-03-01T12:05:00.001Z", now)).toBe(false);
    });

    it("is true for an already expired token", () => {
      expect(isTokenExpiringSoon("2025-03-01T11:00:00.000Z", now)).toBe(true);
    });
  });

  describe("toSnapshot()", () => {
    it("strips role and profile while signing out without an identity", () => {
      const state: SessionState = {
        ...signedOutState(),
        phase: "signing_out",
        role: "coach",
        profile: PROFILE,
      };

      const snapshot = toSnapshot(state);

      expect(snapshot.role).toBe("athlete");
      expect(snapshot.profile).toBeNull();
      expect(snapshot.isSignedIn).toBe(false);
      expect(snapshot.needsOnboarding).toBe(false);
    });

    it("derives needsOnboarding for a fresh signup", () => {
      const snapshot = toSnapshot({
        ...signedOutState(),
        phase: "signed_in_new",
        identity: {
          uid: "user-1",
          email: "coach@example.com",
          displayName: null,
          emailVerified: false,
        },
        role: "coach",
        isNewSignup: true,
        profile: PROFILE,
      });

      expect(snapshot.role).toBe("coach");
      expect(snapshot.profile).toEqual(PROFILE);
      expect(snapshot.isSignedIn).toBe(true);
      expect(snapshot.needsOnboarding).toBe(true);
    });

    it("publishes frozen objects", () => {
      expect(Object.isFrozen(toSnapshot(signedOutState()))).toBe(true);
    });
  });

  it("scopes the onboarding key to the identity", () => {
    expect(onboardingKeyFor({ uid: "user-7" })).toBe(
      "hasCompletedOnboarding:user-7"
    );
  });
});

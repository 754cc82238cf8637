// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/component/db/drizzle-local-store.test`
 * Purpose: Verifies the Drizzle local-store adapters against a real in-memory SQLite database.
 * Scope: Preferences, user mirror and session cache clearing. Does NOT involve the coordinator.
 * Invariants:
 *   - Preference writes upsert; removing a missing key is a no-op
 *   - Mirror upsert replaces every field of an existing row
 *   - Clearing biometric state leaves unrelated preferences alone
 * Side-effects: IO (in-memory SQLite)
 * Links: src/adapters/server/local/, src/adapters/server/db/drizzle.client.ts
 * @internal
 */

import { FakeClock } from "@tests/_fakes";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  DrizzleMirror,
  DrizzlePreferences,
  DrizzleSessionCaches,
  type LocalDatabase,
  openLocalDatabase,
} from "@/adapters/server";
import { FakeSignedUrlIssuer } from "@/adapters/test";
import { SignedUrlCache } from "@/features/media/public";
import { cachedUsers, uploadQueue } from "@/shared/db";
import { makeNoopLogger } from "@/shared/observability";

describe("Drizzle local store", () => {
  let local: LocalDatabase;
  let clock: FakeClock;
  let preferences: DrizzlePreferences;
  let mirror: DrizzleMirror;

  beforeEach(() => {
    local = openLocalDatabase(":memory:");
    clock = new FakeClock();
    preferences = new DrizzlePreferences(local.db, clock);
    mirror = new DrizzleMirror(local.db, clock);
  });

  afterEach(() => {
    local.close();
  });

  describe("DrizzlePreferences", () => {
    it("upserts and reads values", async () => {
      await preferences.set("userRole", "athlete");
      await preferences.set("userRole", "coach");

      expect(await preferences.get("userRole")).toBe("coach");
    });

    it("returns null for missing keys and removes idempotently", async () => {
      await preferences.set("userRole", "coach");

      await preferences.remove("userRole");
      await preferences.remove("userRole");

      expect(await preferences.get("userRole")).toBeNull();
    });
  });

  describe("DrizzleMirror", () => {
    it("replaces the cached user on upsert", async () => {
      await mirror.upsert({
        uid: "user-1",
        email: "athlete@example.com",
        displayName: null,
        role: "athlete",
        isPremium: false,
        createdAt: null,
      });
      clock.advance(1000);
      await mirror.upsert({
        uid: "user-1",
        email: "athlete@example.com",
        displayName: "Avery",
        role: "coach",
        isPremium: true,
        createdAt: "2025-01-01T00:00:00.000Z",
      });

      expect(await mirror.get("user-1")).toEqual({
        uid: "user-1",
        email: "athlete@example.com",
        displayName: "Avery",
        role: "coach",
        isPremium: true,
        createdAt: "2025-01-01T00:00:00.000Z",
      });
      const rows = local.db.select().from(cachedUsers).all();
      expect(rows).toHaveLength(1);
      expect(rows[0]?.updatedAt).toBe("2025-03-01T12:00:01.000Z");
    });

    it("removes the cached user", async () => {
      await mirror.upsert({
        uid: "user-1",
        email: null,
        displayName: null,
        role: "athlete",
        isPremium: false,
        createdAt: null,
      });

      await mirror.remove("user-1");

      expect(await mirror.get("user-1")).toBeNull();
    });
  });

  describe("DrizzleSessionCaches", () => {
    function makeCaches() {
      const signedUrls = new SignedUrlCache(
        new FakeSignedUrlIssuer(clock),
        clock,
        makeNoopLogger()
      );
      const caches = new DrizzleSessionCaches(
        local.db,
        preferences,
        signedUrls
      );
      return { caches, signedUrls };
    }

    it("clears biometric keys but keeps other preferences", async () => {
      const { caches } = makeCaches();
      await preferences.set("biometric_enabled", "true");
      await preferences.set("biometric_email", "athlete@example.com");
      await preferences.set("userRole", "coach");

      await caches.clearBiometricCredentials();

      expect(await preferences.get("biometric_enabled")).toBeNull();
      expect(await preferences.get("biometric_email")).toBeNull();
      expect(await preferences.get("userRole")).toBe("coach");
    });

    it("empties the upload queue", async () => {
      const { caches } = makeCaches();
      local.db
        .insert(uploadQueue)
        .values([
          { uid: "user-1", filePath: "/tmp/a.mov", enqueuedAt: clock.now() },
          { uid: "user-1", filePath: "/tmp/b.mov", enqueuedAt: clock.now() },
        ])
        .run();

      await caches.clearUploadQueue();

      expect(local.db.select().from(uploadQueue).all()).toEqual([]);
    });

    it("clears the signed URL cache", async () => {
      const { caches, signedUrls } = makeCaches();
      await signedUrls.getVideoUrl("folder-1", "swing.mov");

      await caches.clearSignedUrls();

      expect(signedUrls.size).toBe(0);
    });

    it("sets and resets the analytics identity", async () => {
      const { caches } = makeCaches();

      await caches.setAnalyticsIdentity("user-1");
      expect(await preferences.get("analytics_user_id")).toBe("user-1");

      await caches.resetAnalyticsIdentity();
      expect(await preferences.get("analytics_user_id")).toBeNull();
    });
  });
});

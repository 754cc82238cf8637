// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/local/drizzle-session-caches`
 * Purpose: SessionCaches implementation - biometric keys, upload queue, analytics identity, signed-URL cache.
 * Scope: Clears or sets session-scoped local state. Does not touch the remote store or the credential.
 * Invariants: Every clear is idempotent; analytics identity is a single preference row.
 * Side-effects: IO (database operations)
 * Notes: The signed-URL cache is in-process; it is handed in structurally so adapters stay free of feature imports.
 * Links: Implements SessionCaches port
 * @public
 */

import { inArray } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import type { LocalPreferences, SessionCaches } from "@/ports";
import { PREFERENCE_KEYS } from "@/shared/constants";
import { uploadQueue, preferences as preferencesTable } from "@/shared/db";

export interface ClearableCache {
  clear(): void;
}

export class DrizzleSessionCaches implements SessionCaches {
  constructor(
    private readonly db: Database,
    private readonly preferences: LocalPreferences,
    private readonly signedUrls: ClearableCache
  ) {}

  async clearBiometricCredentials(): Promise<void> {
    this.db
      .delete(preferencesTable)
      .where(
        inArray(preferencesTable.key, [
          PREFERENCE_KEYS.biometricEnabled,
          PREFERENCE_KEYS.biometricEmail,
        ])
      )
      .run();
  }

  async clearUploadQueue(): Promise<void> {
    this.db.delete(uploadQueue).run();
  }

  async clearSignedUrls(): Promise<void> {
    this.signedUrls.clear();
  }

  async setAnalyticsIdentity(uid: string): Promise<void> {
    await this.preferences.set(PREFERENCE_KEYS.analyticsUserId, uid);
  }

  async resetAnalyticsIdentity(): Promise<void> {
    await this.preferences.remove(PREFERENCE_KEYS.analyticsUserId);
  }
}

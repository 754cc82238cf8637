// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/local/drizzle-preferences`
 * Purpose: LocalPreferences implementation over the SQLite `preferences` table.
 * Scope: Scalar key/value reads and writes. Does not interpret keys.
 * Invariants: set() upserts; remove() of a missing key is a no-op.
 * Side-effects: IO (database operations)
 * Links: Implements LocalPreferences port
 * @public
 */

import { eq } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import type { Clock, LocalPreferences } from "@/ports";
import { preferences } from "@/shared/db";

export class DrizzlePreferences implements LocalPreferences {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock
  ) {}

  async get(key: string): Promise<string | null> {
    const row = this.db
      .select({ value: preferences.value })
      .from(preferences)
      .where(eq(preferences.key, key))
      .get();
    return row?.value ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    const updatedAt = this.clock.now();
    this.db
      .insert(preferences)
      .values({ key, value, updatedAt })
      .onConflictDoUpdate({
        target: preferences.key,
        set: { value, updatedAt },
      })
      .run();
  }

  async remove(key: string): Promise<void> {
    this.db.delete(preferences).where(eq(preferences.key, key)).run();
  }
}

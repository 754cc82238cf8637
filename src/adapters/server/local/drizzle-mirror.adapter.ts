// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/local/drizzle-mirror`
 * Purpose: LocalMirror implementation over the SQLite `cached_users` table.
 * Scope: One cached record per uid. Does not reconcile with the remote profile.
 * Invariants: upsert replaces every field of an existing row; rows carry updated_at from the injected clock.
 * Side-effects: IO (database operations)
 * Links: Implements LocalMirror port
 * @public
 */

import { eq } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import type { CachedUser, Clock, LocalMirror } from "@/ports";
import { cachedUsers } from "@/shared/db";

export class DrizzleMirror implements LocalMirror {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock
  ) {}

  async get(uid: string): Promise<CachedUser | null> {
    const row = this.db
      .select()
      .from(cachedUsers)
      .where(eq(cachedUsers.uid, uid))
      .get();
    if (!row) return null;

    return {
      uid: row.uid,
      email: row.email,
      displayName: row.displayName,
      role: row.role,
      isPremium: row.isPremium,
      createdAt: row.createdAt,
    };
  }

  async upsert(user: CachedUser): Promise<void> {
    const fields = {
      email: user.email,
      displayName: user.displayName,
      role: user.role,
      isPremium: user.isPremium,
      createdAt: user.createdAt,
      updatedAt: this.clock.now(),
    };

    this.db
      .insert(cachedUsers)
      .values({ uid: user.uid, ...fields })
      .onConflictDoUpdate({ target: cachedUsers.uid, set: fields })
      .run();
  }

  async remove(uid: string): Promise<void> {
    this.db.delete(cachedUsers).where(eq(cachedUsers.uid, uid)).run();
  }
}

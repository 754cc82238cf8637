// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/local-store`
 * Purpose: On-device persistence - scalar preference flags and the local mirror of the signed-in user.
 * Scope: Key/value get/set/remove and one cached user record per identity. Does not talk to the remote store.
 * Invariants: Best-effort cache only; the remote profile is authoritative outside the signup window.
 * Side-effects: none (interface definition only)
 * Links: Implemented by Drizzle (SQLite) adapters; used by SessionCoordinator
 * @public
 */

import type { UserRole } from "@/core";

export interface LocalPreferences {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  remove(key: string): Promise<void>;
}

export interface CachedUser {
  uid: string;
  email: string | null;
  displayName: string | null;
  role: UserRole;
  isPremium: boolean;
  createdAt: string | null;
}

export interface LocalMirror {
  get(uid: string): Promise<CachedUser | null>;
  upsert(user: CachedUser): Promise<void>;
  remove(uid: string): Promise<void>;
}

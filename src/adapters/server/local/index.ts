// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/local`
 * Purpose: On-device store adapters (SQLite via Drizzle).
 * Scope: Re-exports only. Does not open databases.
 * Invariants: Named exports only
 * Side-effects: none
 * Links: Wired by bootstrap/container
 * @public
 */

export { DrizzleMirror } from "./drizzle-mirror.adapter";
export { DrizzlePreferences } from "./drizzle-preferences.adapter";
export {
  type ClearableCache,
  DrizzleSessionCaches,
} from "./drizzle-session-caches.adapter";

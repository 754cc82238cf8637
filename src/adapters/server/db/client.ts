// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db`
 * Purpose: Database adapter entry point for the on-device store.
 * Scope: Re-exports database client and types. Does not contain implementation logic.
 * Invariants: Clean entry point for database access
 * Side-effects: none (re-exports only)
 * Links: Used by local adapters and the container
 * @public
 */

export {
  type Database,
  type LocalDatabase,
  openLocalDatabase,
} from "./drizzle.client";

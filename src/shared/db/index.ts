// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db`
 * Purpose: Barrel export for the local database schema.
 * Scope: Exposes table definitions. Does not handle connections or migrations.
 * Invariants: Only re-exports public APIs; maintains type safety.
 * Side-effects: none
 * Links: Used by adapters for database operations
 * @public
 */

export * from "./schema";

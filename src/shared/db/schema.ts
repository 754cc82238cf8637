// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema`
 * Purpose: Drizzle schema definitions for the on-device store.
 * Scope: Re-exports the local SQLite tables (see schema.local.ts). Does not handle connections or migrations.
 * Invariants: All tables have proper types and constraints.
 * Side-effects: none (schema definitions only)
 * Links: None
 * @public
 */

export * from "./schema.local";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema.local`
 * Purpose: On-device SQLite tables - scalar preferences, the local user mirror, and the pending upload queue.
 * Scope: Table definitions only. Does not include remote (Firestore) documents.
 * Invariants: cached_users holds at most one row per uid; preferences keys are unique.
 * Side-effects: none (schema definitions only)
 * Notes: DDL lives in adapters/server/db/local-store.sql; tests/component/db/local-store-ddl.test.ts checks the two agree.
 * Links: Used by adapters/server/local
 * @public
 */

import { sql } from "drizzle-orm";
import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const preferences = sqliteTable("preferences", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
  updatedAt: text("updated_at")
    .notNull()
    .default(sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`),
});

export const cachedUsers = sqliteTable("cached_users", {
  uid: text("uid").primaryKey(),
  email: text("email"),
  displayName: text("display_name"),
  role: text("role", { enum: ["athlete", "coach"] }).notNull(),
  isPremium: integer("is_premium", { mode: "boolean" })
    .notNull()
    .default(false),
  createdAt: text("created_at"),
  updatedAt: text("updated_at").notNull(),
});

/**
 * Recordings waiting to be uploaded for the signed-in athlete.
 * Emptied at every account boundary.
 */
export const uploadQueue = sqliteTable("upload_queue", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  uid: text("uid").notNull(),
  filePath: text("file_path").notNull(),
  status: text("status", { enum: ["pending", "uploading", "failed"] })
    .notNull()
    .default("pending"),
  enqueuedAt: text("enqueued_at").notNull(),
});

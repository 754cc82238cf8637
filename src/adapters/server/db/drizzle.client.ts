// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle.client`
 * Purpose: Drizzle client over the on-device SQLite file.
 * Scope: Opens the database, applies the local-store DDL, exposes a schema-aware Drizzle instance. Does not handle business logic.
 * Invariants: DDL is idempotent (CREATE TABLE IF NOT EXISTS); one handle per container; ":memory:" never touches the filesystem.
 * Side-effects: IO (creates the parent directory and database file on open)
 * Notes: Uses better-sqlite3 (synchronous driver) with Drizzle ORM; the composition root owns open/close.
 * Links: Used by adapters/server/local for queries
 * @internal
 */

import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";

import Sqlite from "better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";

import * as schema from "@/shared/db";

// Schema-aware database type
export type Database = BetterSQLite3Database<typeof schema>;

export interface LocalDatabase {
  db: Database;
  close(): void;
}

const IN_MEMORY = ":memory:";

const LOCAL_STORE_DDL = new URL(
  "./local-store.sql",
  import.meta.url
);

export function openLocalDatabase(path: string): LocalDatabase {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const client = new Sqlite(path);
  client.pragma("journal_mode = WAL");
  client.exec(readFileSync(LOCAL_STORE_DDL, "utf8"));

  return {
    db: drizzle(client, { schema }),
    close: () => client.close(),
  };
}

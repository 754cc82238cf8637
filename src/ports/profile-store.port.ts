// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/profile-store`
 * Purpose: Remote profile document store keyed by user id.
 * Scope: Read, merge-write and delete of `users/{uid}`. Does not decide which role wins.
 * Invariants: readProfile returns null for an absent document (absence is not a failure); writes merge.
 * Side-effects: none (interface definition only)
 * Notes: Reads may lag writes (provider propagation); callers retry with backoff.
 * Links: Implemented by FirestoreProfileStore and InMemoryProfileStore
 * @public
 */

import type { UserProfile, UserRole } from "@/core";

export interface ProfileWrite {
  email: string;
  role: UserRole;
  displayName?: string | null;
  isPremium?: boolean;
}

export interface ProfileWriteOptions {
  /** Stamp createdAt as well as updatedAt */
  create?: boolean;
}

export type ProfileStoreOperation = "read" | "write" | "delete";

export class ProfileStorePortError extends Error {
  constructor(
    public readonly operation: ProfileStoreOperation,
    public readonly uid: string,
    message: string
  ) {
    super(`Profile ${operation} failed for ${uid}: ${message}`);
    this.name = "ProfileStorePortError";
  }
}

export function isProfileStorePortError(
  error: unknown
): error is ProfileStorePortError {
  return error instanceof Error && error.name === "ProfileStorePortError";
}

export interface ProfileStore {
  readProfile(uid: string): Promise<UserProfile | null>;

  writeProfile(
    uid: string,
    fields: ProfileWrite,
    options?: ProfileWriteOptions
  ): Promise<void>;

  deleteProfile(uid: string): Promise<void>;
}

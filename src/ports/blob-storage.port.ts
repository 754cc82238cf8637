// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/blob-storage`
 * Purpose: Remote blob storage owned by a user (recorded videos and thumbnails).
 * Scope: Bulk deletion for account removal. Does not upload or list for display.
 * Invariants: deleteUserBlobs removes everything under the user's prefix or throws.
 * Side-effects: none (interface definition only)
 * Links: Implemented by FirebaseBlobStorage; used by the account deletion cascade
 * @public
 */

export interface BlobStorage {
  /** Deletes every blob under the user's storage prefix; returns the count removed */
  deleteUserBlobs(uid: string): Promise<number>;
}

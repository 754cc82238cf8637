// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/firebase/storage-blob`
 * Purpose: BlobStorage implementation over Cloud Storage for Firebase.
 * Scope: Recursive deletion of everything under `athlete_videos/{uid}`. Does not upload.
 * Invariants: Walks nested prefixes depth-first; any failed delete rejects the whole call.
 * Side-effects: IO (Cloud Storage network calls)
 * Links: Implements BlobStorage port
 * @public
 */

import {
  deleteObject,
  type FirebaseStorage,
  listAll,
  ref,
  type StorageReference,
} from "firebase/storage";

import type { BlobStorage } from "@/ports";
import { userBlobPrefix } from "@/shared/constants";
import { EVENT_NAMES, makeLogger } from "@/shared/observability";

const logger = makeLogger({ component: "FirebaseBlobStorage" });

async function deleteTree(folder: StorageReference): Promise<number> {
  const listing = await listAll(folder);
  await Promise.all(listing.items.map((item) => deleteObject(item)));

  let deleted = listing.items.length;
  for (const prefix of listing.prefixes) {
    deleted += await deleteTree(prefix);
  }
  return deleted;
}

export class FirebaseBlobStorage implements BlobStorage {
  constructor(private readonly storage: FirebaseStorage) {}

  async deleteUserBlobs(uid: string): Promise<number> {
    const deleted = await deleteTree(ref(this.storage, userBlobPrefix(uid)));
    logger.info(
      { event: EVENT_NAMES.ADAPTER_BLOB_STORAGE_DELETED, uid, deleted },
      "deleted user blobs"
    );
    return deleted;
  }
}

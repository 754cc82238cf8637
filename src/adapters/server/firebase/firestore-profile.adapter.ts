// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/firebase/firestore-profile`
 * Purpose: ProfileStore implementation over the Firestore `users` collection.
 * Scope: Read, merge-write and delete of `users/{uid}`; validates documents with zod. Does not reconcile roles.
 * Invariants: Absent document reads as null; writes always merge and stamp updatedAt with the server timestamp; unknown roles parse to the default.
 * Side-effects: IO (Firestore network calls)
 * Notes: Reads may return a stale absence right after a write; the coordinator's backoff covers that window.
 * Links: Implements ProfileStore port
 * @public
 */

import {
  deleteDoc,
  doc,
  type DocumentReference,
  type Firestore,
  getDoc,
  serverTimestamp,
  setDoc,
  Timestamp,
} from "firebase/firestore";
import { z } from "zod";

import { parseRole, type UserProfile } from "@/core";
import {
  type ProfileStore,
  type ProfileStoreOperation,
  ProfileStorePortError,
  type ProfileWrite,
  type ProfileWriteOptions,
} from "@/ports";
import { USERS_COLLECTION } from "@/shared/constants";

const timestampSchema = z
  .instanceof(Timestamp)
  .nullish()
  .transform((value) => (value ? value.toDate().toISOString() : null));

const userDocumentSchema = z.object({
  email: z.string().default(""),
  role: z.unknown().transform(parseRole),
  isPremium: z.boolean().default(false),
  displayName: z.string().nullish().transform((value) => value ?? null),
  createdAt: timestampSchema,
  updatedAt: timestampSchema,
});

/**
 * Maps a `users/{uid}` document to a profile. Timestamps become ISO strings;
 * a missing or unknown role becomes the default.
 * @throws ProfileStorePortError when a field has the wrong type
 */
export function parseUserDocument(uid: string, data: unknown): UserProfile {
  const parsed = userDocumentSchema.safeParse(data);
  if (!parsed.success) {
    throw new ProfileStorePortError(
      "read",
      uid,
      `malformed document: ${parsed.error.issues.map((issue) => issue.path.join(".")).join(", ")}`
    );
  }
  return { uid, ...parsed.data };
}

export class FirestoreProfileStore implements ProfileStore {
  constructor(private readonly db: Firestore) {}

  async readProfile(uid: string): Promise<UserProfile | null> {
    const snapshot = await this.run("read", uid, () => getDoc(this.ref(uid)));
    if (!snapshot.exists()) return null;

    return parseUserDocument(uid, snapshot.data());
  }

  async writeProfile(
    uid: string,
    fields: ProfileWrite,
    options: ProfileWriteOptions = {}
  ): Promise<void> {
    const data = {
      email: fields.email,
      role: fields.role,
      ...(fields.displayName !== undefined && {
        displayName: fields.displayName,
      }),
      ...(fields.isPremium !== undefined && { isPremium: fields.isPremium }),
      ...(options.create && {
        isPremium: fields.isPremium ?? false,
        createdAt: serverTimestamp(),
      }),
      updatedAt: serverTimestamp(),
    };

    await this.run("write", uid, () =>
      setDoc(this.ref(uid), data, { merge: true })
    );
  }

  async deleteProfile(uid: string): Promise<void> {
    await this.run("delete", uid, () => deleteDoc(this.ref(uid)));
  }

  private ref(uid: string): DocumentReference {
    return doc(this.db, USERS_COLLECTION, uid);
  }

  private async run<T>(
    operation: ProfileStoreOperation,
    uid: string,
    call: () => Promise<T>
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProfileStorePortError(operation, uid, message);
    }
  }
}

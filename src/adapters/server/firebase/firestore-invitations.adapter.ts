// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/firebase/firestore-invitations`
 * Purpose: InvitationDirectory implementation over the Firestore `invitations` collection.
 * Scope: Server-side count of pending invitations for a coach email. Does not fetch invitation bodies.
 * Invariants: Matches `coachEmail` exactly; callers pass the lower-cased address.
 * Side-effects: IO (Firestore aggregate query)
 * Links: Implements InvitationDirectory port
 * @public
 */

import {
  collection,
  type Firestore,
  getCountFromServer,
  query,
  where,
} from "firebase/firestore";

import type { InvitationDirectory } from "@/ports";
import {
  INVITATIONS_COLLECTION,
  PENDING_INVITATION_STATUS,
} from "@/shared/constants";

export class FirestoreInvitationDirectory implements InvitationDirectory {
  constructor(private readonly db: Firestore) {}

  async countPendingInvitations(email: string): Promise<number> {
    const pending = query(
      collection(this.db, INVITATIONS_COLLECTION),
      where("coachEmail", "==", email),
      where("status", "==", PENDING_INVITATION_STATUS)
    );
    const snapshot = await getCountFromServer(pending);
    return snapshot.data().count;
  }
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/firebase`
 * Purpose: Firebase-backed adapters (Auth, Firestore, Storage, Functions).
 * Scope: Re-exports only. Does not initialize Firebase at import time.
 * Invariants: Named exports only
 * Side-effects: none
 * Links: Wired by bootstrap/container when APP_ENV=production
 * @public
 */

export { type FirebaseServices, initFirebase } from "./app";
export { authErrorCodeFor, mapFirebaseAuthError } from "./auth-errors";
export { FirebaseCredentialProvider } from "./firebase-credential.adapter";
export { FirestoreInvitationDirectory } from "./firestore-invitations.adapter";
export {
  FirestoreProfileStore,
  parseUserDocument,
} from "./firestore-profile.adapter";
export { FirebaseSignedUrlIssuer } from "./functions-signed-url.adapter";
export { FirebaseBlobStorage } from "./storage-blob.adapter";

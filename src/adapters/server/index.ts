// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export {
  type Database,
  type LocalDatabase,
  openLocalDatabase,
} from "./db/client";
export {
  FirebaseBlobStorage,
  FirebaseCredentialProvider,
  type FirebaseServices,
  FirebaseSignedUrlIssuer,
  FirestoreInvitationDirectory,
  FirestoreProfileStore,
  initFirebase,
  mapFirebaseAuthError,
} from "./firebase";
export {
  type ClearableCache,
  DrizzleMirror,
  DrizzlePreferences,
  DrizzleSessionCaches,
} from "./local";
export { SystemClock } from "./time/system.adapter";
export { TimerDelay } from "./time/timer-delay.adapter";

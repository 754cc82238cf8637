// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces and port-level errors - canonical import surface.
 * Scope: Re-exports public port interfaces and error classes. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling except error classes, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { BlobStorage } from "./blob-storage.port";
export type { Clock } from "./clock.port";
export {
  type AuthStateListener,
  type CredentialProvider,
  CredentialProviderPortError,
  isCredentialProviderPortError,
  type Unsubscribe,
} from "./credential-provider.port";
export {
  type Delay,
  DelayAbortedError,
  isDelayAbortedError,
} from "./delay.port";
export type { InvitationDirectory } from "./invitation-directory.port";
export type {
  CachedUser,
  LocalMirror,
  LocalPreferences,
} from "./local-store.port";
export {
  isProfileStorePortError,
  type ProfileStore,
  type ProfileStoreOperation,
  ProfileStorePortError,
  type ProfileWrite,
  type ProfileWriteOptions,
} from "./profile-store.port";
export type { SessionCaches } from "./session-caches.port";
export type {
  SignedUrlIssuer,
  SignedUrlKind,
  SignedUrlRequest,
} from "./signed-url-issuer.port";

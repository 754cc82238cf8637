// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/constants`
 * Purpose: Application-wide constants - remote collection names, storage prefixes, preference keys.
 * Scope: Exports immutable values used across adapters and features. Does not contain mutable state.
 * Invariants: Values are immutable and compile-time constant; names match the deployed Firebase project.
 * Side-effects: none
 * Links: Used by Firebase adapters and the session coordinator
 * @public
 */

/* Firestore collections */
export const USERS_COLLECTION = "users" as const;
export const INVITATIONS_COLLECTION = "invitations" as const;
export const PENDING_INVITATION_STATUS = "pending" as const;

/* Cloud Storage */
export const ATHLETE_VIDEOS_PREFIX = "athlete_videos" as const;

export function userBlobPrefix(uid: string): string {
  return `${ATHLETE_VIDEOS_PREFIX}/${uid}`;
}

/* Cloud Functions */
export const SIGNED_VIDEO_URL_FUNCTION = "getSignedVideoURL" as const;
export const SIGNED_THUMBNAIL_URL_FUNCTION = "getSignedThumbnailURL" as const;

/* Local preference keys */
export const PREFERENCE_KEYS = {
  userRole: "userRole",
  biometricEnabled: "biometric_enabled",
  biometricEmail: "biometric_email",
  analyticsUserId: "analytics_user_id",
} as const;

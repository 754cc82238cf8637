// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/signed-url-issuer`
 * Purpose: Remote issuer of time-limited download URLs for shared-folder media.
 * Scope: One call per URL. Does not cache; response shape is validated by the caller.
 * Invariants: Returns the raw callable payload; callers must not trust its shape.
 * Side-effects: none (interface definition only)
 * Links: Implemented by FirebaseSignedUrlIssuer; used by SignedUrlCache
 * @public
 */

export type SignedUrlKind = "video" | "thumbnail";

export interface SignedUrlRequest {
  folderId: string;
  /** Video file name; thumbnails are derived from the video's name */
  fileName: string;
  expirationHours: number;
}

export interface SignedUrlIssuer {
  issue(kind: SignedUrlKind, request: SignedUrlRequest): Promise<unknown>;
}

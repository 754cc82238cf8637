// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/media/public`
 * Purpose: Public API surface for the media feature.
 * Scope: Re-exports public types and classes; does not implement logic.
 * Invariants: Feature consumers import from this file only.
 * Side-effects: none
 * Links: Part of hexagonal architecture boundary enforcement
 * @public
 */

export {
  isSignedUrlError,
  SignedUrlError,
  type SignedUrlErrorCode,
} from "./errors";
export {
  SignedUrlCache,
  type SignedUrlOptions,
  signedUrlKey,
  THUMBNAIL_URL_EXPIRATION_HOURS,
  URL_REFRESH_MARGIN_MS,
  VIDEO_URL_EXPIRATION_HOURS,
} from "./services/signedUrlCache";

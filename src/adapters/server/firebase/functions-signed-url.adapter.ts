// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/firebase/functions-signed-url`
 * Purpose: SignedUrlIssuer implementation over the signed-URL Cloud Functions.
 * Scope: One callable invocation per request. Does not cache or validate the payload.
 * Invariants: Video requests send `fileName`; thumbnail requests send `videoFileName` (the function derives the thumbnail path).
 * Side-effects: IO (Cloud Functions network calls)
 * Links: Implements SignedUrlIssuer port; consumed by features/media SignedUrlCache
 * @public
 */

import { type Functions, httpsCallable } from "firebase/functions";

import type {
  SignedUrlIssuer,
  SignedUrlKind,
  SignedUrlRequest,
} from "@/ports";
import {
  SIGNED_THUMBNAIL_URL_FUNCTION,
  SIGNED_VIDEO_URL_FUNCTION,
} from "@/shared/constants";

export class FirebaseSignedUrlIssuer implements SignedUrlIssuer {
  constructor(private readonly functions: Functions) {}

  async issue(kind: SignedUrlKind, request: SignedUrlRequest): Promise<unknown> {
    const { folderId, fileName, expirationHours } = request;

    if (kind === "video") {
      const callable = httpsCallable(this.functions, SIGNED_VIDEO_URL_FUNCTION);
      const result = await callable({
        folderID: folderId,
        fileName,
        expirationHours,
      });
      return result.data;
    }

    const callable = httpsCallable(
      this.functions,
      SIGNED_THUMBNAIL_URL_FUNCTION
    );
    const result = await callable({
      folderID: folderId,
      videoFileName: fileName,
      expirationHours,
    });
    return result.data;
  }
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/media/services/signedUrlCache`
 * Purpose: Per-process TTL cache of signed video and thumbnail URLs.
 * Scope: Issues through SignedUrlIssuer on miss, validates the payload, reuses fresh entries. Does not download media.
 * Invariants:
 * - Keys are `video_<folder>_<file>` and `thumbnail_<folder>_<file>`
 * - An entry is reused only while more than URL_REFRESH_MARGIN_MS remain before it expires
 * - Nothing is cached when the issuer fails or returns a malformed payload
 * Side-effects: IO (issuer calls), logging
 * Notes: Cleared at every account boundary via SessionCaches.clearSignedUrls.
 * Links: ports/signed-url-issuer.port.ts
 * @public
 */

import { z } from "zod";

import type { Clock, SignedUrlIssuer, SignedUrlKind } from "@/ports";
import { EVENT_NAMES, type Logger } from "@/shared/observability";

import { SignedUrlError } from "../errors";

export const VIDEO_URL_EXPIRATION_HOURS = 24;
export const THUMBNAIL_URL_EXPIRATION_HOURS = 168;
export const URL_REFRESH_MARGIN_MS = 5 * 60 * 1000;

export interface SignedUrlOptions {
  expirationHours?: number;
  forceRefresh?: boolean;
}

interface CachedUrl {
  url: string;
  expiresAt: number;
}

const issuedUrlSchema = z.object({
  signedURL: z.string().min(1),
  expiresAt: z.string(),
});

export function signedUrlKey(
  kind: SignedUrlKind,
  folderId: string,
  fileName: string
): string {
  return `${kind}_${folderId}_${fileName}`;
}

export class SignedUrlCache {
  private readonly entries = new Map<string, CachedUrl>();

  constructor(
    private readonly issuer: SignedUrlIssuer,
    private readonly clock: Clock,
    private readonly logger: Logger
  ) {}

  get size(): number {
    return this.entries.size;
  }

  getVideoUrl(
    folderId: string,
    fileName: string,
    options: SignedUrlOptions = {}
  ): Promise<string> {
    return this.resolve("video", folderId, fileName, {
      expirationHours: options.expirationHours ?? VIDEO_URL_EXPIRATION_HOURS,
      forceRefresh: options.forceRefresh ?? false,
    });
  }

  getThumbnailUrl(
    folderId: string,
    videoFileName: string,
    options: SignedUrlOptions = {}
  ): Promise<string> {
    return this.resolve("thumbnail", folderId, videoFileName, {
      expirationHours:
        options.expirationHours ?? THUMBNAIL_URL_EXPIRATION_HOURS,
      forceRefresh: options.forceRefresh ?? false,
    });
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Drops entries already past expiry; returns how many were removed */
  cleanExpired(): number {
    const now = this.clock.nowMs();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  private async resolve(
    kind: SignedUrlKind,
    folderId: string,
    fileName: string,
    options: Required<SignedUrlOptions>
  ): Promise<string> {
    const key = signedUrlKey(kind, folderId, fileName);
    const cached = this.entries.get(key);

    if (
      !options.forceRefresh &&
      cached &&
      cached.expiresAt - this.clock.nowMs() > URL_REFRESH_MARGIN_MS
    ) {
      this.logger.debug(
        { event: EVENT_NAMES.MEDIA_SIGNED_URL_CACHE_HIT, key },
        "using cached signed url"
      );
      return cached.url;
    }

    let payload: unknown;
    try {
      payload = await this.issuer.issue(kind, {
        folderId,
        fileName,
        expirationHours: options.expirationHours,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SignedUrlError(
        "ISSUER_FAILED",
        `Cloud Function call failed: ${reason}`,
        { cause: error }
      );
    }

    const parsed = issuedUrlSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SignedUrlError(
        "INVALID_RESPONSE",
        "Invalid response from Cloud Function"
      );
    }

    const expiresAt = Date.parse(parsed.data.expiresAt);
    if (Number.isNaN(expiresAt)) {
      throw new SignedUrlError(
        "INVALID_EXPIRATION",
        "Invalid expiration date format"
      );
    }

    this.entries.set(key, { url: parsed.data.signedURL, expiresAt });
    this.logger.debug(
      {
        event: EVENT_NAMES.MEDIA_SIGNED_URL_ISSUED,
        key,
        expiresAt: parsed.data.expiresAt,
      },
      "signed url issued"
    );
    return parsed.data.signedURL;
  }
}

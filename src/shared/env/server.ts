// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the session runtime; provides lazy environment access. Does not wire adapters.
 * Invariants: All required env vars validated on first access; Firebase project config is required when APP_ENV=production; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV selects adapter wiring (test = in-memory fakes); SERVICE_NAME for observability.
 *        Lazy init prevents import-time access.
 * Links: SPEC_FULL.md §9
 * @public
 */

import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const FIREBASE_REQUIRED_KEYS = [
  "FIREBASE_API_KEY",
  "FIREBASE_AUTH_DOMAIN",
  "FIREBASE_PROJECT_ID",
  "FIREBASE_APP_ID",
  "FIREBASE_STORAGE_BUCKET",
] as const;

const serverSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),

    // Application environment (controls adapter wiring)
    APP_ENV: z.enum(["test", "production"]),

    // Service identity for observability
    SERVICE_NAME: z.string().default("diamond-session"),

    // Firebase project
    FIREBASE_API_KEY: z.string().min(1).optional(),
    FIREBASE_AUTH_DOMAIN: z.string().min(1).optional(),
    FIREBASE_PROJECT_ID: z.string().min(1).optional(),
    FIREBASE_APP_ID: z.string().min(1).optional(),
    FIREBASE_STORAGE_BUCKET: z.string().min(1).optional(),
    FIREBASE_FUNCTIONS_REGION: z.string().min(1).default("us-central1"),

    // On-device store (SQLite file, or :memory:)
    LOCAL_DB_PATH: z.string().min(1).default(".data/session.db"),

    // Profile reconciliation backoff
    PROFILE_LOAD_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
    PROFILE_LOAD_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),

    // Optional
    PINO_LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error"])
      .default("info"),
  })
  .superRefine((env, ctx) => {
    if (env.APP_ENV !== "production") return;
    for (const key of FIREBASE_REQUIRED_KEYS) {
      if (env[key] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.invalid_type,
          expected: "string",
          received: "undefined",
          path: [key],
          message: `${key} is required when APP_ENV=production`,
        });
      }
    }
  });

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

/**
 * Parses an env source without caching. serverEnv() is the cached entry point;
 * this is used by the composition root when a caller supplies its own env.
 */
export function parseServerEnv(
  source: Record<string, string | undefined>
): ServerEnv {
  try {
    const parsed = serverSchema.parse(source);
    return {
      ...parsed,
      isDev: parsed.NODE_ENV === "development",
      isTest: parsed.NODE_ENV === "test",
      isProd: parsed.NODE_ENV === "production",
      isTestMode: parsed.APP_ENV === "test",
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();

      for (const issue of error.issues) {
        const key = issue.path[0]?.toString();
        if (!key) continue;

        /*
         * Treat all invalid_type as missing (avoids any casting)
         */
        if (issue.code === "invalid_type") {
          missing.add(key);
        } else {
          invalid.add(key);
        }
      }

      throw new EnvValidationError({
        code: "INVALID_ENV",
        missing: [...missing],
        invalid: [...invalid],
      });
    }

    throw error;
  }
}

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    ENV = parseServerEnv(process.env);
  }
  return ENV;
}

/**
 * Drops the cached env so the next serverEnv() call re-reads process.env.
 * Tests only.
 */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };

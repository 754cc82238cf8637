// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public surface for environment configuration module with validated env objects.
 * Scope: Re-exports server env accessors. Does not export internal schemas.
 * Invariants: Only re-exports public APIs.
 * Side-effects: process.env
 * Links: ./server.ts
 * @public
 */

export type { EnvValidationMeta, ServerEnv } from "./server";
export {
  EnvValidationError,
  parseServerEnv,
  resetServerEnv,
  serverEnv,
} from "./server";

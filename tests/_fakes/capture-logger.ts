// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/capture-logger`
 * Purpose: Pino logger that keeps every emitted line as a parsed object.
 * Scope: Lets tests assert structured log events. Does NOT write to stdout.
 * Invariants: No pid, hostname or time fields, so lines compare exactly.
 * Side-effects: none
 * Links: src/shared/observability/server/logEvent.ts
 * @public
 */

import pino from "pino";

import type { Logger } from "@/shared/observability";

export interface CapturedLogger {
  logger: Logger;
  lines: Record<string, unknown>[];
}

export function makeCaptureLogger(): CapturedLogger {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { base: null, timestamp: false },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === "object" && parsed !== null) {
          lines.push({ ...parsed });
        }
      },
    }
  );
  return { logger, lines };
}

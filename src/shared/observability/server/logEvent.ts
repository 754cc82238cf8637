// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/logEvent`
 * Purpose: Type-safe event logger that enforces event name registry and base fields.
 * Scope: Single function for logging structured events. Does not create loggers.
 * Invariants: opId MUST be present (throws in tests, logs error elsewhere); event name MUST be from registry.
 * Side-effects: IO (logging)
 * Links: Uses EVENT_NAMES registry from events/index.ts; called by features/adapters.
 * @public
 */

import type { Logger } from "pino";
import type { EventBase, EventName } from "../events";

export type LogLevel = "info" | "warn" | "error";

/**
 * @param logger - Pino logger instance
 * @param eventName - Event name from EVENT_NAMES registry
 * @param fields - Event-specific fields (MUST include opId)
 * @param message - Human-readable message (defaults to event name)
 * @param level - Defaults to info
 */
export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  message?: string,
  level: LogLevel = "info"
): void {
  if (!fields.opId) {
    const isStrict =
      typeof process !== "undefined" && process.env.VITEST === "true";

    if (isStrict) {
      throw new Error(
        `INVARIANT VIOLATION: logEvent("${eventName}") called without opId`
      );
    }
    logger.error(
      { event: eventName, missingField: "opId" },
      "inv_missing_opId_in_logEvent"
    );
    return;
  }

  logger[level]({ event: eventName, ...fields }, message ?? eventName);
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/session/services/accountDeletion`
 * Purpose: Best-effort cascade that removes everything an account owns, credential last.
 * Scope: Runs each step once, in order, and reports failures. Does not clear session state (the coordinator does).
 * Invariants:
 * - Steps run storage → profile → biometric → mirror → credential regardless of earlier failures
 * - Only the credential step decides success; earlier failures are logged and reported
 * Side-effects: IO (remote blob/profile deletion, local cache clears, credential deletion)
 * Links: Called by SessionCoordinator.deleteAccount
 * @internal
 */

import type { DeletionReport, DeletionStep, Identity } from "@/core";
import type {
  BlobStorage,
  CredentialProvider,
  LocalMirror,
  ProfileStore,
  SessionCaches,
} from "@/ports";
import {
  EVENT_NAMES,
  type Logger,
  logEvent,
  type LogLevel,
  type SessionAccountDeletionStepFailedEvent,
} from "@/shared/observability";

export interface AccountDeletionDeps {
  credentials: CredentialProvider;
  profiles: ProfileStore;
  blobs: BlobStorage;
  mirror: LocalMirror;
  caches: SessionCaches;
  logger: Logger;
}

export interface AccountDeletionOutcome {
  report: DeletionReport;
  /** Set when the credential itself could not be deleted */
  credentialError: unknown;
}

function logStepFailure(
  logger: Logger,
  failure: { opId: string; uid: string; step: DeletionStep; error: unknown },
  message: string,
  level: LogLevel
): void {
  const event: SessionAccountDeletionStepFailedEvent = {
    event: EVENT_NAMES.SESSION_ACCOUNT_DELETION_STEP_FAILED,
    opId: failure.opId,
    uid: failure.uid,
    step: failure.step,
    error:
      failure.error instanceof Error
        ? failure.error.message
        : String(failure.error),
  };
  logEvent(logger, event.event, { ...event }, message, level);
}

export async function deleteAccountCascade(
  deps: AccountDeletionDeps,
  identity: Identity,
  opId: string
): Promise<AccountDeletionOutcome> {
  const { uid } = identity;
  const failedSteps: DeletionStep[] = [];

  const steps: ReadonlyArray<[DeletionStep, () => Promise<unknown>]> = [
    ["storage", () => deps.blobs.deleteUserBlobs(uid)],
    ["profile", () => deps.profiles.deleteProfile(uid)],
    ["biometric", () => deps.caches.clearBiometricCredentials()],
    ["mirror", () => deps.mirror.remove(uid)],
  ];

  for (const [step, run] of steps) {
    try {
      await run();
    } catch (error) {
      failedSteps.push(step);
      logStepFailure(
        deps.logger,
        { opId, uid, step, error },
        "account deletion step failed, continuing",
        "warn"
      );
    }
  }

  try {
    await deps.credentials.deleteCurrentAccount();
  } catch (error) {
    failedSteps.push("credential");
    logStepFailure(
      deps.logger,
      { opId, uid, step: "credential", error },
      "credential deletion failed",
      "error"
    );
    return { report: { uid, failedSteps }, credentialError: error };
  }

  return { report: { uid, failedSteps }, credentialError: null };
}

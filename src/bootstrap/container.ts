// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for the application composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports and build SessionCoordinator instances. Does not hold a module-level coordinator.
 * Invariants: All ports wired; the container owns the local database handle and closes it; APP_ENV=test wires in-memory Firebase fakes.
 * Side-effects: IO (opens the local database, initializes Firebase in production, emits startup log)
 * Notes: The local store is always real SQLite (":memory:" under tests); only remote services are faked.
 * Links: Used by src/index.ts and hosts; configure adapters here for DI.
 * @public
 */

import {
  DrizzleMirror,
  DrizzlePreferences,
  DrizzleSessionCaches,
  FirebaseBlobStorage,
  FirebaseCredentialProvider,
  FirebaseSignedUrlIssuer,
  FirestoreInvitationDirectory,
  FirestoreProfileStore,
  initFirebase,
  openLocalDatabase,
  SystemClock,
  TimerDelay,
} from "@/adapters/server";
import {
  FakeBlobStorage,
  FakeCredentialProvider,
  FakeInvitationDirectory,
  FakeProfileStore,
  FakeSignedUrlIssuer,
} from "@/adapters/test";
import { SignedUrlCache } from "@/features/media/public";
import {
  SessionCoordinator,
  type SessionCoordinatorDeps,
} from "@/features/session/public";
import type {
  BlobStorage,
  Clock,
  CredentialProvider,
  Delay,
  InvitationDirectory,
  LocalMirror,
  LocalPreferences,
  ProfileStore,
  SessionCaches,
  SignedUrlIssuer,
} from "@/ports";
import { type ServerEnv, serverEnv } from "@/shared/env";
import { type Logger, makeLogger } from "@/shared/observability";

interface RemoteServices {
  credentials: CredentialProvider;
  profiles: ProfileStore;
  invitations: InvitationDirectory;
  blobs: BlobStorage;
  signedUrlIssuer: SignedUrlIssuer;
}

export interface Container {
  log: Logger;
  env: ServerEnv;
  clock: Clock;
  delay: Delay;
  credentials: CredentialProvider;
  profiles: ProfileStore;
  invitations: InvitationDirectory;
  blobs: BlobStorage;
  signedUrlIssuer: SignedUrlIssuer;
  preferences: LocalPreferences;
  mirror: LocalMirror;
  caches: SessionCaches;
  signedUrls: SignedUrlCache;
  /** Fresh coordinator over this container's adapters; the caller owns its lifecycle */
  createSessionCoordinator(): SessionCoordinator;
  /** Closes the local database handle */
  close(): void;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - closes the local database and allows a fresh container.
 */
export function resetContainer(): void {
  _container?.close();
  _container = null;
}

function wireRemoteServices(env: ServerEnv, clock: Clock): RemoteServices {
  if (env.isTestMode) {
    return {
      credentials: new FakeCredentialProvider({ clock }),
      profiles: new FakeProfileStore(clock),
      invitations: new FakeInvitationDirectory(),
      blobs: new FakeBlobStorage(),
      signedUrlIssuer: new FakeSignedUrlIssuer(clock),
    };
  }

  const firebase = initFirebase(env);
  return {
    credentials: new FirebaseCredentialProvider(firebase.auth),
    profiles: new FirestoreProfileStore(firebase.firestore),
    invitations: new FirestoreInvitationDirectory(firebase.firestore),
    blobs: new FirebaseBlobStorage(firebase.storage),
    signedUrlIssuer: new FirebaseSignedUrlIssuer(firebase.functions),
  };
}

export function createContainer(env: ServerEnv = serverEnv()): Container {
  const log = makeLogger({ service: env.SERVICE_NAME });

  // Startup log - confirm config (no keys)
  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      localDb: env.LOCAL_DB_PATH,
      projectId: env.FIREBASE_PROJECT_ID ?? null,
    },
    "container initialized"
  );

  const clock = new SystemClock();
  const delay = new TimerDelay();
  const remote = wireRemoteServices(env, clock);

  // Always use the real local store
  const local = openLocalDatabase(env.LOCAL_DB_PATH);
  const preferences = new DrizzlePreferences(local.db, clock);
  const mirror = new DrizzleMirror(local.db, clock);
  const signedUrls = new SignedUrlCache(
    remote.signedUrlIssuer,
    clock,
    log.child({ component: "SignedUrlCache" })
  );
  const caches = new DrizzleSessionCaches(local.db, preferences, signedUrls);

  const sessionDeps: SessionCoordinatorDeps = {
    ...remote,
    preferences,
    mirror,
    caches,
    delay,
    clock,
    logger: log,
  };

  return {
    log,
    env,
    clock,
    delay,
    ...remote,
    preferences,
    mirror,
    caches,
    signedUrls,
    createSessionCoordinator: () =>
      new SessionCoordinator(sessionDeps, {
        profileLoad: {
          maxAttempts: env.PROFILE_LOAD_MAX_ATTEMPTS,
          baseDelayMs: env.PROFILE_LOAD_BASE_DELAY_MS,
        },
      }),
    close: () => local.close(),
  };
}

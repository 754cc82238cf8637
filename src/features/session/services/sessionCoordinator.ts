// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/session/services/sessionCoordinator`
 * Purpose: Owns the signed-in session - identity, role, onboarding and profile - and publishes immutable snapshots.
 * Scope: Sign-up, sign-in, sign-out, profile reconciliation, account deletion, provider push handling. Does not render UI or talk to Firebase directly (ports only).
 * Invariants:
 * - Credential operations and provider pushes run one at a time through a SerialQueue
 * - Every commit after a suspension point checks the session scope; an aborted scope commits nothing
 * - Signed-out snapshots carry the default role and no profile
 * - During the signup window the locally chosen role wins over a remote read
 * - isLoading is true exactly while at least one operation is in flight
 * Side-effects: IO (through injected ports), logging
 * Notes: Constructed by the composition root; there is no module-level instance.
 * Links: core/session/rules, ./profileLoader, ./accountDeletion
 * @public
 */

import { randomUUID } from "node:crypto";

import {
  AuthError,
  DEFAULT_ROLE,
  type DeletionReport,
  type Identity,
  InvalidSessionTransitionError,
  isPendingPhase,
  isTokenExpiringSoon,
  isValidTransition,
  normalizeEmail,
  onboardingKeyFor,
  PROFILE_LOAD_BASE_DELAY_MS,
  PROFILE_LOAD_MAX_ATTEMPTS,
  type ProfileLoadMode,
  type ProfileLoadOutcome,
  parseRole,
  type RefreshedToken,
  resolveObservedRole,
  type SessionResult,
  type SessionSnapshot,
  type SessionState,
  signedOutState,
  toSnapshot,
  type UserProfile,
  type UserRole,
} from "@/core";
import type {
  BlobStorage,
  CachedUser,
  Clock,
  CredentialProvider,
  Delay,
  InvitationDirectory,
  LocalMirror,
  LocalPreferences,
  ProfileStore,
  SessionCaches,
  Unsubscribe,
} from "@/ports";
import { PREFERENCE_KEYS } from "@/shared/constants";
import {
  type EventName,
  EVENT_NAMES,
  type Logger,
  type LogLevel,
  logEvent,
  type SessionStateTransitionEvent,
} from "@/shared/observability";

import { toAuthError } from "../errors";
import { deleteAccountCascade } from "./accountDeletion";
import { loadProfileWithRetry, type ProfileLoadPolicy } from "./profileLoader";
import { SerialQueue } from "./serialQueue";

// ============================================================================
// Types
// ============================================================================

export interface SessionCoordinatorDeps {
  credentials: CredentialProvider;
  profiles: ProfileStore;
  preferences: LocalPreferences;
  mirror: LocalMirror;
  caches: SessionCaches;
  blobs: BlobStorage;
  invitations: InvitationDirectory;
  delay: Delay;
  clock: Clock;
  logger: Logger;
}

export interface SessionCoordinatorConfig {
  profileLoad: ProfileLoadPolicy;
}

export interface SignUpInput {
  email: string;
  password: string;
  displayName?: string | null;
}

export interface SignInInput {
  email: string;
  password: string;
}

export type SessionListener = (snapshot: SessionSnapshot) => void;

const DEFAULT_CONFIG: SessionCoordinatorConfig = {
  profileLoad: {
    maxAttempts: PROFILE_LOAD_MAX_ATTEMPTS,
    baseDelayMs: PROFILE_LOAD_BASE_DELAY_MS,
  },
};

const CANCELLED = { status: "cancelled" } as const;

function ok<T>(value: T): SessionResult<T> {
  return { status: "ok", value };
}

function failed<T>(error: AuthError): SessionResult<T> {
  return { status: "failed", error };
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Coordinator
// ============================================================================

export class SessionCoordinator {
  private state: SessionState = signedOutState();
  private snapshot: SessionSnapshot = toSnapshot(this.state);
  private readonly listeners = new Set<SessionListener>();
  private readonly queue = new SerialQueue();
  /** Session-scoped local writes and local clearing, in submission order */
  private readonly localWrites = new SerialQueue();
  private readonly background = new Set<Promise<void>>();
  private scope = new AbortController();
  private inFlight = 0;
  private pendingSignOut: Promise<void> | null = null;
  private unsubscribeAuth: Unsubscribe | null = null;
  private readonly logger: Logger;
  private readonly config: SessionCoordinatorConfig;

  constructor(
    private readonly deps: SessionCoordinatorDeps,
    config: Partial<SessionCoordinatorConfig> = {}
  ) {
    this.logger = deps.logger.child({ component: "SessionCoordinator" });
    this.config = {
      profileLoad: config.profileLoad ?? DEFAULT_CONFIG.profileLoad,
    };
  }

  // ==========================================================================
  // Observation
  // ==========================================================================

  getSnapshot(): SessionSnapshot {
    return this.snapshot;
  }

  subscribe(listener: SessionListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once queued credential work, background profile reconciliation
   * and any pending sign-out have settled.
   */
  async whenIdle(): Promise<void> {
    for (;;) {
      const pending: Promise<void>[] = [...this.background];
      if (this.pendingSignOut) pending.push(this.pendingSignOut);
      await Promise.all(pending);
      await this.queue.idle();
      if (this.background.size === 0 && this.pendingSignOut === null) return;
    }
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Subscribes to provider pushes and adopts a credential the provider already holds.
   */
  async start(): Promise<void> {
    if (this.unsubscribeAuth) return;
    const opId = randomUUID();

    this.unsubscribeAuth = this.deps.credentials.onAuthStateChange(
      (identity) => {
        this.track(
          this.queue.run(() => this.handleAuthStateChange(identity))
        );
      }
    );

    const identity = this.deps.credentials.currentIdentity();
    this.log(EVENT_NAMES.SESSION_STARTED, {
      opId,
      restored: identity !== null,
    });

    if (identity && this.state.identity === null) {
      await this.queue.run(() => this.adoptIdentity(opId, identity));
    }
  }

  /** Stops listening to the provider and cancels background reconciliation. */
  stop(): void {
    this.unsubscribeAuth?.();
    this.unsubscribeAuth = null;
    this.renewScope();
  }

  // ==========================================================================
  // Sign-up
  // ==========================================================================

  signUp(input: SignUpInput): Promise<SessionResult<Identity>> {
    return this.performSignUp(input, "athlete");
  }

  /** Sign-up with the coach role; also counts invitations waiting for this email. */
  signUpAsCoach(input: SignUpInput): Promise<SessionResult<Identity>> {
    return this.performSignUp(input, "coach");
  }

  private performSignUp(
    input: SignUpInput,
    role: UserRole
  ): Promise<SessionResult<Identity>> {
    const opId = randomUUID();
    return this.withLoading(opId, async () => {
      const scope = this.scope.signal;
      const email = normalizeEmail(input.email);
      const prior = this.priorFields();

      // Role is visible before any network call
      this.commit(opId, {
        phase: "signing_up",
        role,
        isNewSignup: true,
        errorMessage: null,
        lastError: null,
      });
      this.log(EVENT_NAMES.SESSION_SIGN_UP_STARTED, { opId, role });

      const result = await this.queue.run(
        async (): Promise<SessionResult<Identity>> => {
          if (scope.aborted) return CANCELLED;
          try {
            let identity = await this.deps.credentials.createAccount(
              email,
              input.password
            );
            if (input.displayName) {
              identity = await this.setDisplayName(
                opId,
                identity,
                input.displayName
              );
            }
            if (scope.aborted) return CANCELLED;

            this.commit(opId, {
              phase: "signed_in_new",
              identity,
              role,
              isNewSignup: true,
              onboardingComplete: false,
              profile: null,
              profileStatus: "idle",
              pendingInvitationCount: 0,
            });
            await this.persistRole(opId, identity, scope, role);
            await this.mirrorUser(opId, identity, scope, role, null);
            await this.rememberAnalytics(opId, identity, scope);
            if (!this.owns(identity.uid, scope)) return CANCELLED;

            try {
              await this.deps.profiles.writeProfile(
                identity.uid,
                {
                  email: identity.email ?? email,
                  role,
                  displayName: identity.displayName,
                  isPremium: false,
                },
                { create: true }
              );
            } catch (error) {
              // Reconciliation repairs a missing document after the retry window
              this.log(
                EVENT_NAMES.SESSION_PROFILE_WRITE_FAILED,
                { opId, uid: identity.uid, error: messageOf(error) },
                "warn"
              );
            }
            if (!this.owns(identity.uid, scope)) return CANCELLED;

            // The round trip must not have changed what the user chose
            this.commit(opId, { role });
            this.log(EVENT_NAMES.SESSION_SIGN_UP_COMPLETED, {
              opId,
              uid: identity.uid,
              role,
            });
            return ok(identity);
          } catch (error) {
            return this.failCredentialOperation(opId, scope, prior, error);
          }
        }
      );

      if (result.status === "ok") {
        const identity = result.value;
        await this.reconcileProfile(opId, identity, "signup", scope, false);
        if (role === "coach") {
          await this.refreshInvitationCount(opId, identity, email, scope);
        }
      }
      return result;
    });
  }

  // ==========================================================================
  // Sign-in
  // ==========================================================================

  signIn(input: SignInInput): Promise<SessionResult<Identity>> {
    const opId = randomUUID();
    return this.withLoading(opId, async () => {
      const scope = this.scope.signal;
      const prior = this.priorFields();

      this.commit(opId, {
        phase: "signing_in",
        isNewSignup: false,
        errorMessage: null,
        lastError: null,
      });
      this.log(EVENT_NAMES.SESSION_SIGN_IN_STARTED, { opId });

      const result = await this.queue.run(
        async (): Promise<SessionResult<Identity>> => {
          if (scope.aborted) return CANCELLED;
          try {
            const identity = await this.deps.credentials.authenticate(
              normalizeEmail(input.email),
              input.password
            );
            if (scope.aborted) return CANCELLED;

            const cached = await this.readMirror(opId, identity.uid);
            const onboardingComplete = await this.readOnboarding(
              opId,
              identity
            );
            if (scope.aborted) return CANCELLED;

            // Never show the previous account's role: mirrored role for this uid, else default
            const role = cached?.role ?? DEFAULT_ROLE;
            this.commit(opId, {
              phase: "signed_in_existing",
              identity,
              role,
              isNewSignup: false,
              onboardingComplete,
              profile: null,
              profileStatus: "idle",
              pendingInvitationCount: 0,
            });
            await this.persistRole(opId, identity, scope, role);
            await this.rememberAnalytics(opId, identity, scope);
            if (!this.owns(identity.uid, scope)) return CANCELLED;

            this.log(EVENT_NAMES.SESSION_SIGN_IN_COMPLETED, {
              opId,
              uid: identity.uid,
            });
            return ok(identity);
          } catch (error) {
            return this.failCredentialOperation(opId, scope, prior, error);
          }
        }
      );

      if (result.status === "ok") {
        await this.reconcileProfile(
          opId,
          result.value,
          "existing",
          scope,
          true
        );
      }
      return result;
    });
  }

  // ==========================================================================
  // Profile
  // ==========================================================================

  /**
   * Re-reads the remote profile for the current identity with bounded retry.
   * Signup mode while the signup window is open, existing mode otherwise.
   */
  loadProfile(): Promise<ProfileLoadOutcome> {
    const identity = this.state.identity;
    if (!identity) return Promise.resolve({ status: "unavailable" });

    const opId = randomUUID();
    const mode: ProfileLoadMode = this.state.isNewSignup ? "signup" : "existing";
    return this.withLoading(opId, () =>
      this.reconcileProfile(opId, identity, mode, this.scope.signal, false)
    );
  }

  private async reconcileProfile(
    opId: string,
    identity: Identity,
    mode: ProfileLoadMode,
    scope: AbortSignal,
    createIfAbsent: boolean
  ): Promise<ProfileLoadOutcome> {
    const { uid } = identity;
    if (!this.owns(uid, scope)) return CANCELLED;

    this.commit(opId, { profileStatus: "loading" });
    const fetched = await loadProfileWithRetry(
      { profiles: this.deps.profiles, delay: this.deps.delay, logger: this.logger },
      uid,
      this.config.profileLoad,
      { signal: scope, opId }
    );

    if (fetched.status === "cancelled" || !this.owns(uid, scope)) {
      this.log(EVENT_NAMES.SESSION_PROFILE_LOAD_CANCELLED, { opId, uid });
      return CANCELLED;
    }

    if (fetched.status === "found") {
      return this.adoptRemoteProfile(opId, identity, mode, scope, fetched.profile);
    }

    if (mode === "signup" || (createIfAbsent && fetched.status === "absent")) {
      return this.repairProfile(opId, identity, scope, fetched.attempts);
    }

    this.commit(opId, { profile: null, profileStatus: "unavailable" });
    this.log(
      EVENT_NAMES.SESSION_PROFILE_UNAVAILABLE,
      {
        opId,
        uid,
        attempts: fetched.attempts,
        outcome: fetched.status,
        ...(fetched.status === "unavailable"
          ? { error: messageOf(fetched.lastError) }
          : {}),
      },
      "warn"
    );
    return { status: "unavailable" };
  }

  private async adoptRemoteProfile(
    opId: string,
    identity: Identity,
    mode: ProfileLoadMode,
    scope: AbortSignal,
    remote: UserProfile
  ): Promise<ProfileLoadOutcome> {
    const role = resolveObservedRole({
      mode,
      isNewSignup: this.state.isNewSignup,
      localRole: this.state.role,
      remoteRole: remote.role,
    });
    const profile: UserProfile = { ...remote, role };

    if (role !== remote.role) {
      // Stale remote role inside the signup window: push the chosen role back
      try {
        await this.deps.profiles.writeProfile(identity.uid, {
          email: remote.email,
          role,
        });
      } catch (error) {
        this.log(
          EVENT_NAMES.SESSION_PROFILE_WRITE_FAILED,
          { opId, uid: identity.uid, error: messageOf(error) },
          "warn"
        );
      }
      if (!this.owns(identity.uid, scope)) return CANCELLED;
    }

    this.commit(opId, { role, profile, profileStatus: "loaded" });
    await this.persistRole(opId, identity, scope, role);
    await this.mirrorUser(opId, identity, scope, role, profile);
    if (!this.owns(identity.uid, scope)) return CANCELLED;
    this.log(EVENT_NAMES.SESSION_PROFILE_LOADED, {
      opId,
      uid: identity.uid,
      role,
      mode,
    });
    return { status: "loaded", profile };
  }

  /**
   * Writes a profile built from local state when the remote document never
   * became readable. Create-with-merge: a late-arriving original write and this
   * one converge on the same fields.
   */
  private async repairProfile(
    opId: string,
    identity: Identity,
    scope: AbortSignal,
    attempts: number
  ): Promise<ProfileLoadOutcome> {
    const { uid } = identity;
    const role = this.state.role;
    const now = this.deps.clock.now();
    const profile: UserProfile = {
      uid,
      email: identity.email ?? "",
      role,
      isPremium: false,
      displayName: identity.displayName,
      createdAt: now,
      updatedAt: now,
    };

    try {
      await this.deps.profiles.writeProfile(
        uid,
        {
          email: profile.email,
          role,
          displayName: profile.displayName,
          isPremium: false,
        },
        { create: true }
      );
    } catch (error) {
      this.log(
        EVENT_NAMES.SESSION_PROFILE_WRITE_FAILED,
        { opId, uid, error: messageOf(error) },
        "warn"
      );
      if (!this.owns(uid, scope)) return CANCELLED;
      this.commit(opId, { profile: null, profileStatus: "unavailable" });
      return { status: "unavailable" };
    }
    if (!this.owns(uid, scope)) return CANCELLED;

    this.commit(opId, { role, profile, profileStatus: "repaired" });
    await this.persistRole(opId, identity, scope, role);
    await this.mirrorUser(opId, identity, scope, role, profile);
    if (!this.owns(uid, scope)) return CANCELLED;
    this.log(
      EVENT_NAMES.SESSION_PROFILE_REPAIRED,
      { opId, uid, role, attempts },
      "warn"
    );
    return { status: "repaired", profile };
  }

  private async refreshInvitationCount(
    opId: string,
    identity: Identity,
    email: string,
    scope: AbortSignal
  ): Promise<void> {
    try {
      const count =
        await this.deps.invitations.countPendingInvitations(email);
      if (!this.owns(identity.uid, scope)) return;
      this.commit(opId, { pendingInvitationCount: count });
      this.log(EVENT_NAMES.SESSION_COACH_INVITATIONS_FOUND, {
        opId,
        uid: identity.uid,
        count,
      });
    } catch (error) {
      this.logger.warn(
        { opId, uid: identity.uid, err: messageOf(error) },
        "pending invitation lookup failed"
      );
    }
  }

  // ==========================================================================
  // Onboarding
  // ==========================================================================

  completeOnboarding(): Promise<void> {
    return this.finishOnboarding(false);
  }

  skipOnboarding(): Promise<void> {
    return this.finishOnboarding(true);
  }

  private async finishOnboarding(skipped: boolean): Promise<void> {
    const identity = this.state.identity;
    if (!identity) return;
    const opId = randomUUID();
    const scope = this.scope.signal;

    this.commit(opId, {
      onboardingComplete: true,
      isNewSignup: false,
      ...(this.state.phase === "signed_in_new"
        ? { phase: "signed_in_existing" as const }
        : {}),
    });
    await this.persistLocal(opId, identity.uid, scope, "preferences", () =>
      this.deps.preferences.set(onboardingKeyFor(identity), "true")
    );
    this.log(EVENT_NAMES.SESSION_ONBOARDING_COMPLETED, {
      opId,
      uid: identity.uid,
      skipped,
    });
  }

  // ==========================================================================
  // Sign-out
  // ==========================================================================

  /**
   * Idempotent. Session fields are cleared and published before the provider
   * confirms; concurrent calls share one sign-out.
   */
  signOut(): Promise<void> {
    if (this.state.phase === "signed_out") return Promise.resolve();
    if (this.pendingSignOut) return this.pendingSignOut;

    const opId = randomUUID();
    const identity = this.state.identity;
    this.renewScope();
    this.commit(opId, { ...signedOutState(), phase: "signing_out" });

    // Queued before returning: a credential call made after signOut() reaches the provider after it
    const clearing = this.clearLocalSession(opId, identity);
    const providerSignOut = this.queue.run(async () => {
      await clearing;
      try {
        await this.deps.credentials.signOut();
      } catch (error) {
        this.logger.error(
          { opId, err: messageOf(error) },
          "provider sign-out failed; local session already cleared"
        );
      }
    });

    const pending = this.withLoading(opId, async () => {
      await providerSignOut;
      if (this.state.phase === "signing_out") {
        this.commit(opId, { phase: "signed_out" });
      }
      this.log(EVENT_NAMES.SESSION_SIGNED_OUT, {
        opId,
        uid: identity?.uid,
      });
    }).finally(() => {
      this.pendingSignOut = null;
    });

    this.pendingSignOut = pending;
    return pending;
  }

  // ==========================================================================
  // Account deletion
  // ==========================================================================

  deleteAccount(): Promise<SessionResult<DeletionReport>> {
    const identity = this.state.identity;
    if (!identity) {
      return Promise.resolve(
        failed(new AuthError("UNKNOWN", "No user signed in"))
      );
    }

    const opId = randomUUID();
    // Background reconciliation must not re-create what is being deleted
    this.renewScope();

    return this.withLoading(opId, () =>
      this.queue.run(async (): Promise<SessionResult<DeletionReport>> => {
        const outcome = await deleteAccountCascade(
          {
            credentials: this.deps.credentials,
            profiles: this.deps.profiles,
            blobs: this.deps.blobs,
            mirror: this.deps.mirror,
            caches: this.deps.caches,
            logger: this.logger,
          },
          identity,
          opId
        );

        if (outcome.report.failedSteps.includes("credential")) {
          const authError = toAuthError(outcome.credentialError);
          if (this.state.identity?.uid === identity.uid) {
            this.commit(opId, {
              errorMessage: authError.userMessage,
              lastError: authError,
            });
          }
          return failed(authError);
        }

        if (this.state.identity?.uid === identity.uid) {
          await this.endSessionLocally(opId, identity);
        }
        this.log(EVENT_NAMES.SESSION_ACCOUNT_DELETED, {
          opId,
          uid: identity.uid,
          failedSteps: outcome.report.failedSteps,
        });
        return ok(outcome.report);
      })
    );
  }

  // ==========================================================================
  // Credential utilities
  // ==========================================================================

  /** User-initiated; never retried. */
  sendPasswordReset(email: string): Promise<SessionResult<void>> {
    const opId = randomUUID();
    return this.withLoading(opId, async () => {
      try {
        await this.deps.credentials.sendPasswordReset(normalizeEmail(email));
        this.log(EVENT_NAMES.SESSION_PASSWORD_RESET_SENT, { opId });
        return ok(undefined);
      } catch (error) {
        const authError = toAuthError(error);
        this.commit(opId, {
          errorMessage: authError.userMessage,
          lastError: authError,
        });
        this.log(
          EVENT_NAMES.SESSION_AUTH_FAILED,
          { opId, operation: "sendPasswordReset", code: authError.code },
          "warn"
        );
        return failed(authError);
      }
    });
  }

  async refreshToken(force = false): Promise<SessionResult<RefreshedToken>> {
    const opId = randomUUID();
    try {
      const token = await this.deps.credentials.refreshToken(force);
      const expiresSoon = isTokenExpiringSoon(
        token.expiresAt,
        this.deps.clock.now()
      );
      this.log(EVENT_NAMES.SESSION_TOKEN_REFRESHED, {
        opId,
        force,
        expiresAt: token.expiresAt,
        expiresSoon,
      });
      return ok({ ...token, expiresSoon });
    } catch (error) {
      const authError = toAuthError(error);
      this.log(
        EVENT_NAMES.SESSION_AUTH_FAILED,
        { opId, operation: "refreshToken", code: authError.code },
        "warn"
      );
      return failed(authError);
    }
  }

  clearError(): void {
    if (this.state.errorMessage === null && this.state.lastError === null) {
      return;
    }
    this.commit(randomUUID(), { errorMessage: null, lastError: null });
  }

  // ==========================================================================
  // Provider push
  // ==========================================================================

  private async handleAuthStateChange(identity: Identity | null): Promise<void> {
    const opId = randomUUID();
    const current = this.state.identity;
    this.log(EVENT_NAMES.SESSION_AUTH_PUSH_RECEIVED, {
      opId,
      uid: identity?.uid ?? null,
      phase: this.state.phase,
    });

    // An explicit operation owns the transition
    if (isPendingPhase(this.state.phase)) return;

    // Superseded by a later credential change; that change's own push follows
    const held = this.deps.credentials.currentIdentity();
    if ((held?.uid ?? null) !== (identity?.uid ?? null)) {
      this.logger.debug(
        { opId, pushed: identity?.uid ?? null, held: held?.uid ?? null },
        "stale auth push ignored"
      );
      return;
    }

    if (identity && current?.uid === identity.uid) {
      const fresh = this.deps.credentials.currentIdentity();
      this.commit(opId, {
        identity: fresh?.uid === identity.uid ? fresh : identity,
      });
      return;
    }

    if (current) {
      await this.endSessionLocally(opId, current);
    }
    if (identity) {
      await this.adoptIdentity(opId, identity);
    }
  }

  /**
   * Presents a credential established outside an explicit sign-in (process
   * start, provider push) as an existing account and reconciles its profile
   * in the background.
   */
  private async adoptIdentity(opId: string, identity: Identity): Promise<void> {
    const scope = this.scope.signal;
    const cached = await this.readMirror(opId, identity.uid);
    const persistedRole = cached
      ? null
      : await this.readPreference(opId, PREFERENCE_KEYS.userRole);
    const onboardingComplete = await this.readOnboarding(opId, identity);
    if (scope.aborted || this.state.phase !== "signed_out") return;

    const role = cached?.role ?? parseRole(persistedRole);
    this.commit(opId, {
      phase: "signed_in_existing",
      identity,
      role,
      isNewSignup: false,
      onboardingComplete,
      profile: null,
      profileStatus: "idle",
    });

    this.track(
      this.withLoading(opId, () =>
        this.reconcileProfile(opId, identity, "existing", scope, false)
      )
    );
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private commit(opId: string, patch: Partial<SessionState>): void {
    const from = this.state.phase;
    const to = patch.phase ?? from;
    if (!isValidTransition(from, to)) {
      throw new InvalidSessionTransitionError(from, to);
    }

    this.state = { ...this.state, ...patch, isLoading: this.inFlight > 0 };
    this.snapshot = toSnapshot(this.state);

    if (from !== to) {
      const transition: SessionStateTransitionEvent = {
        event: EVENT_NAMES.SESSION_STATE_TRANSITION,
        opId,
        fromPhase: from,
        toPhase: to,
        uid: this.state.identity?.uid,
      };
      this.log(transition.event, { ...transition });
    }

    for (const listener of [...this.listeners]) {
      try {
        listener(this.snapshot);
      } catch (error) {
        this.logger.error(
          { opId, err: messageOf(error) },
          "session listener threw"
        );
      }
    }
  }

  private async withLoading<T>(
    opId: string,
    body: () => Promise<T>
  ): Promise<T> {
    this.inFlight += 1;
    if (this.inFlight === 1) this.commit(opId, {});
    try {
      return await body();
    } finally {
      this.inFlight -= 1;
      if (this.inFlight === 0) this.commit(opId, {});
    }
  }

  private track(work: Promise<unknown>): void {
    const tracked: Promise<void> = work
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error(
            { err: messageOf(error) },
            "background session work failed"
          );
        }
      )
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }

  private renewScope(): void {
    this.scope.abort();
    this.scope = new AbortController();
  }

  /** The scope is live and the session still belongs to uid */
  private owns(uid: string, scope: AbortSignal): boolean {
    return !scope.aborted && this.state.identity?.uid === uid;
  }

  private priorFields(): Pick<
    SessionState,
    "phase" | "role" | "profile" | "profileStatus"
  > {
    const { phase, role, profile, profileStatus } = this.state;
    return { phase, role, profile, profileStatus };
  }

  private failCredentialOperation(
    opId: string,
    scope: AbortSignal,
    prior: Pick<SessionState, "phase" | "role" | "profile" | "profileStatus">,
    error: unknown
  ): SessionResult<Identity> {
    if (scope.aborted) return CANCELLED;

    const authError = toAuthError(error);
    const held = this.state.identity;
    const phase = held
      ? prior.phase === "signed_in_new"
        ? "signed_in_new"
        : "signed_in_existing"
      : "signed_out";

    this.commit(opId, {
      phase,
      role: prior.role,
      profile: prior.profile,
      profileStatus: prior.profileStatus,
      isNewSignup: false,
      errorMessage: authError.userMessage,
      lastError: authError,
    });
    this.log(
      EVENT_NAMES.SESSION_AUTH_FAILED,
      { opId, code: authError.code },
      "warn"
    );
    return failed(authError);
  }

  private async setDisplayName(
    opId: string,
    identity: Identity,
    displayName: string
  ): Promise<Identity> {
    try {
      return await this.deps.credentials.updateDisplayName(displayName);
    } catch (error) {
      this.logger.warn(
        { opId, uid: identity.uid, err: messageOf(error) },
        "display name update failed"
      );
      return identity;
    }
  }

  private async endSessionLocally(
    opId: string,
    identity: Identity
  ): Promise<void> {
    this.renewScope();
    this.commit(opId, { ...signedOutState(), phase: "signing_out" });
    await this.clearLocalSession(opId, identity);
    if (this.state.phase === "signing_out") {
      this.commit(opId, { phase: "signed_out" });
    }
  }

  /** Runs after any session write already submitted, so none of them lands after it */
  private clearLocalSession(
    opId: string,
    identity: Identity | null
  ): Promise<void> {
    return this.localWrites.run(() => this.clearLocalStores(opId, identity));
  }

  private async clearLocalStores(
    opId: string,
    identity: Identity | null
  ): Promise<void> {
    const { preferences, mirror, caches } = this.deps;

    await this.bestEffort(opId, "preferences", () =>
      preferences.remove(PREFERENCE_KEYS.userRole)
    );
    if (identity) {
      await this.bestEffort(opId, "preferences", () =>
        preferences.remove(onboardingKeyFor(identity))
      );
      await this.bestEffort(opId, "mirror", () => mirror.remove(identity.uid));
    }
    await this.bestEffort(opId, "biometric", () =>
      caches.clearBiometricCredentials()
    );
    await this.bestEffort(opId, "upload_queue", () => caches.clearUploadQueue());
    await this.bestEffort(opId, "signed_urls", () => caches.clearSignedUrls());
    await this.bestEffort(opId, "analytics", () =>
      caches.resetAnalyticsIdentity()
    );
  }

  /** Skipped once uid no longer owns the session */
  private persistLocal(
    opId: string,
    uid: string,
    scope: AbortSignal,
    target: string,
    write: () => Promise<unknown>
  ): Promise<void> {
    return this.localWrites.run(async () => {
      if (!this.owns(uid, scope)) return;
      await this.bestEffort(opId, target, write);
    });
  }

  private persistRole(
    opId: string,
    identity: Identity,
    scope: AbortSignal,
    role: UserRole
  ): Promise<void> {
    return this.persistLocal(opId, identity.uid, scope, "preferences", () =>
      this.deps.preferences.set(PREFERENCE_KEYS.userRole, role)
    );
  }

  private rememberAnalytics(
    opId: string,
    identity: Identity,
    scope: AbortSignal
  ): Promise<void> {
    return this.persistLocal(opId, identity.uid, scope, "analytics", () =>
      this.deps.caches.setAnalyticsIdentity(identity.uid)
    );
  }

  private mirrorUser(
    opId: string,
    identity: Identity,
    scope: AbortSignal,
    role: UserRole,
    profile: UserProfile | null
  ): Promise<void> {
    return this.persistLocal(opId, identity.uid, scope, "mirror", () =>
      this.deps.mirror.upsert({
        uid: identity.uid,
        email: identity.email,
        displayName: identity.displayName ?? profile?.displayName ?? null,
        role,
        isPremium: profile?.isPremium ?? false,
        createdAt: profile?.createdAt ?? null,
      })
    );
  }

  private async readMirror(
    opId: string,
    uid: string
  ): Promise<CachedUser | null> {
    try {
      return await this.deps.mirror.get(uid);
    } catch (error) {
      this.logger.warn(
        { opId, uid, err: messageOf(error) },
        "local mirror read failed"
      );
      return null;
    }
  }

  private async readPreference(
    opId: string,
    key: string
  ): Promise<string | null> {
    try {
      return await this.deps.preferences.get(key);
    } catch (error) {
      this.logger.warn(
        { opId, key, err: messageOf(error) },
        "preference read failed"
      );
      return null;
    }
  }

  private async readOnboarding(
    opId: string,
    identity: Identity
  ): Promise<boolean> {
    return (
      (await this.readPreference(opId, onboardingKeyFor(identity))) === "true"
    );
  }

  private async bestEffort(
    opId: string,
    target: string,
    write: () => Promise<unknown>
  ): Promise<void> {
    try {
      await write();
    } catch (error) {
      this.log(
        EVENT_NAMES.SESSION_CACHE_WRITE_FAILED,
        { opId, target, error: messageOf(error) },
        "warn"
      );
    }
  }

  private log(
    event: EventName,
    fields: { opId: string } & Record<string, unknown>,
    level: LogLevel = "info"
  ): void {
    logEvent(this.logger, event, fields, undefined, level);
  }
}

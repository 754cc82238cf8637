// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/firebase/firebase-credential`
 * Purpose: CredentialProvider implementation over Firebase Auth (email/password).
 * Scope: Account creation, authentication, sign-out, password reset, token refresh, credential deletion, auth-state push. Does not touch profile documents.
 * Invariants: Every failure is rethrown as CredentialProviderPortError with a mapped taxonomy reason.
 * Side-effects: IO (Firebase Auth network calls)
 * Links: Implements CredentialProvider port; error mapping in ./auth-errors
 * @public
 */

import {
  type Auth,
  createUserWithEmailAndPassword,
  deleteUser,
  onAuthStateChanged,
  sendPasswordResetEmail,
  signInWithEmailAndPassword,
  signOut,
  updateProfile,
  type User,
} from "firebase/auth";

import type { Identity, TokenInfo } from "@/core";
import {
  type AuthStateListener,
  type CredentialProvider,
  CredentialProviderPortError,
  type Unsubscribe,
} from "@/ports";

import { mapFirebaseAuthError } from "./auth-errors";

function toIdentity(user: User): Identity {
  return {
    uid: user.uid,
    email: user.email,
    displayName: user.displayName,
    emailVerified: user.emailVerified,
  };
}

async function guard<T>(call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw mapFirebaseAuthError(error);
  }
}

export class FirebaseCredentialProvider implements CredentialProvider {
  constructor(private readonly auth: Auth) {}

  currentIdentity(): Identity | null {
    const user = this.auth.currentUser;
    return user ? toIdentity(user) : null;
  }

  createAccount(email: string, password: string): Promise<Identity> {
    return guard(async () => {
      const credential = await createUserWithEmailAndPassword(
        this.auth,
        email,
        password
      );
      return toIdentity(credential.user);
    });
  }

  authenticate(email: string, password: string): Promise<Identity> {
    return guard(async () => {
      const credential = await signInWithEmailAndPassword(
        this.auth,
        email,
        password
      );
      return toIdentity(credential.user);
    });
  }

  updateDisplayName(displayName: string): Promise<Identity> {
    return guard(async () => {
      const user = this.requireUser();
      await updateProfile(user, { displayName });
      return toIdentity(user);
    });
  }

  signOut(): Promise<void> {
    return guard(() => signOut(this.auth));
  }

  sendPasswordReset(email: string): Promise<void> {
    return guard(() => sendPasswordResetEmail(this.auth, email));
  }

  onAuthStateChange(listener: AuthStateListener): Unsubscribe {
    return onAuthStateChanged(this.auth, (user) => {
      listener(user ? toIdentity(user) : null);
    });
  }

  refreshToken(force: boolean): Promise<TokenInfo> {
    return guard(async () => {
      const result = await this.requireUser().getIdTokenResult(force);
      return {
        token: result.token,
        issuedAt: new Date(result.issuedAtTime).toISOString(),
        expiresAt: new Date(result.expirationTime).toISOString(),
      };
    });
  }

  deleteCurrentAccount(): Promise<void> {
    return guard(() => deleteUser(this.requireUser()));
  }

  private requireUser(): User {
    const user = this.auth.currentUser;
    if (!user) {
      throw new CredentialProviderPortError(
        "UNKNOWN",
        "auth/no-current-user",
        "No user signed in"
      );
    }
    return user;
  }
}

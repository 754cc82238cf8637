// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/firebase/app`
 * Purpose: Firebase app initialization from validated env.
 * Scope: One named FirebaseApp per process plus its service handles. Does not perform any reads or writes.
 * Invariants: Reuses an already-initialized app of the same name; fails fast when project config is incomplete.
 * Side-effects: none until a service handle is used
 * Links: Used by bootstrap/container in production wiring
 * @internal
 */

import { type FirebaseApp, getApp, getApps, initializeApp } from "firebase/app";
import { type Auth, getAuth } from "firebase/auth";
import { type Firestore, getFirestore } from "firebase/firestore";
import { type Functions, getFunctions } from "firebase/functions";
import { type FirebaseStorage, getStorage } from "firebase/storage";

import type { ServerEnv } from "@/shared/env";

const APP_NAME = "diamond-session";

export interface FirebaseServices {
  app: FirebaseApp;
  auth: Auth;
  firestore: Firestore;
  storage: FirebaseStorage;
  functions: Functions;
}

export function initFirebase(env: ServerEnv): FirebaseServices {
  const {
    FIREBASE_API_KEY: apiKey,
    FIREBASE_AUTH_DOMAIN: authDomain,
    FIREBASE_PROJECT_ID: projectId,
    FIREBASE_APP_ID: appId,
    FIREBASE_STORAGE_BUCKET: storageBucket,
  } = env;

  if (!apiKey || !authDomain || !projectId || !appId || !storageBucket) {
    throw new Error(
      "Firebase project config incomplete: FIREBASE_API_KEY, FIREBASE_AUTH_DOMAIN, FIREBASE_PROJECT_ID, FIREBASE_APP_ID and FIREBASE_STORAGE_BUCKET are required"
    );
  }

  const app = getApps().some((existing) => existing.name === APP_NAME)
    ? getApp(APP_NAME)
    : initializeApp(
        {
          apiKey,
          authDomain,
          projectId,
          appId,
          storageBucket,
        },
        APP_NAME
      );

  return {
    app,
    auth: getAuth(app),
    firestore: getFirestore(app),
    storage: getStorage(app),
    functions: getFunctions(app, env.FIREBASE_FUNCTIONS_REGION),
  };
}

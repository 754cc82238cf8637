// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/setup`
 * Purpose: Global test environment setup - env vars for in-memory wiring and per-test resets.
 * Scope: Configures env and resets cached singletons. Does NOT mock specific services or ports.
 * Invariants: APP_ENV=test wires in-memory Firebase fakes; the local store is ":memory:"; no test reaches the network.
 * Side-effects: process.env
 * Links: vitest.config.mts
 * @public
 */

import { afterEach, beforeAll } from "vitest";

import { resetContainer } from "@/bootstrap/container";
import { resetServerEnv } from "@/shared/env";

/**
 * Global test setup for deterministic, isolated testing.
 *
 * - Unit tests: no I/O, no time, no RNG (use _fakes)
 * - Component tests: real SQLite in memory
 */

beforeAll(() => {
  // Minimal env for validation; remote services are faked under APP_ENV=test
  Object.assign(process.env, {
    NODE_ENV: "test",
    APP_ENV: "test",
    LOCAL_DB_PATH: ":memory:",
  });
});

afterEach(() => {
  resetContainer();
  resetServerEnv();
});

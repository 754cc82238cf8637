// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/invitation-directory`
 * Purpose: Read-only lookup of coach invitations addressed to an email.
 * Scope: Counts pending invitations. Does not accept, decline or create invitations.
 * Invariants: Email comparison is case-insensitive (callers pass the normalized address).
 * Side-effects: none (interface definition only)
 * Links: Implemented by FirestoreInvitationDirectory; used by signUpAsCoach
 * @public
 */

export interface InvitationDirectory {
  countPendingInvitations(email: string): Promise<number>;
}

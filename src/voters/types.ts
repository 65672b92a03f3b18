/**
 * Voter State Machine types
 */

/**
 * Voter lifecycle: INVITED → AUTHENTICATED → VOTED
 */
export enum VoterState {
  INVITED = 'invited',
  AUTHENTICATED = 'authenticated',
  VOTED = 'voted',
}

/**
 * Stored voter record
 *
 * Carries no time of authentication or voting.
 */
export interface VoterRecord {
  voterId: string;
  electionId: string;
  /** Collaborator's reference for the voter, such as an email address */
  externalRef: string;
  identityTokenHash: string;
  secondFactorHash: string | null;
  secondFactorSalt: string | null;
  state: VoterState;
  hasVoted: boolean;
  issuedAt: string;
  expiresAt: string;
}

export interface VoterImport {
  externalRef: string;
  /** Optional knowledge factor checked at validation, e.g. a date of birth */
  secondFactor?: string;
}

export interface TokenIssueOptions {
  /** Identity token lifetime; defaults to the registry's configured TTL */
  ttlHours?: number;
}

/**
 * A raw identity token, returned once for delivery to the voter
 */
export interface IssuedIdentityToken {
  voterId: string;
  externalRef: string;
  identityToken: string;
  expiresAt: string;
}

export interface ImportResult {
  added: number;
  skipped: number;
  /** References that were already registered or repeated in the batch */
  skippedRefs: string[];
  tokens: IssuedIdentityToken[];
}

/**
 * Voter status as reported to administrators
 */
export interface VoterStatus {
  voterId: string;
  electionId: string;
  state: VoterState;
  hasVoted: boolean;
  expiresAt: string;
}

export type StateCounts = Record<VoterState, number>;

/**
 * Token Vault types
 */

/**
 * Stored ballot token; carries nothing that refers to a voter
 */
export interface BallotTokenRecord {
  tokenHash: string;
  electionId: string;
  issuedAt: string;
  expiresAt: string;
  used: boolean;
  usedAt: string | null;
}

/**
 * A raw ballot token, returned once to the voter
 */
export interface IssuedBallotToken {
  ballotToken: string;
  electionId: string;
  expiresAt: string;
}

export interface ValidateOptions {
  /** Required when the voter was imported with a second factor */
  secondFactor?: string;
}

export interface RedeemedBallotToken {
  electionId: string;
  usedAt: string;
}

/**
 * Election Registry types
 */

/**
 * Election lifecycle: DRAFT → OPEN → CLOSED
 */
export enum ElectionStatus {
  DRAFT = 'draft',
  OPEN = 'open',
  CLOSED = 'closed',
}

/**
 * One choice on the ballot
 */
export interface ElectionOption {
  /** Stable id voters seal into their choice, `option-<order>` */
  optionId: string;
  text: string;
  /** 1-based display position */
  order: number;
}

export interface Election {
  electionId: string;
  title: string;
  description: string;
  /** Ordered by `order` */
  options: ElectionOption[];
  /** X25519 public key ballots are sealed to, hex */
  publicKey: string;
  status: ElectionStatus;
  createdAt: string;
  openedAt: string | null;
  closedAt: string | null;
}

export interface CreateElectionInput {
  title: string;
  description?: string;
  /** Option texts in display order; at least two */
  options: string[];
  publicKey: string;
  /** Defaults to a random UUID */
  electionId?: string;
}

/**
 * What a voter is shown before sealing a choice
 */
export interface ElectionBallot {
  electionId: string;
  title: string;
  description: string;
  options: ElectionOption[];
  publicKey: string;
}

/**
 * Voter State Machine
 *
 * INVITED → AUTHENTICATED → VOTED. VOTED is terminal and nothing moves a
 * voter backwards; the storage triggers enforce the same rule.
 */

import { CoreError, CoreErrorCode } from '../errors.js';
import { hashSecret, secureCompare } from '../crypto/index.js';
import { VoterState, type VoterRecord } from './types.js';

/**
 * Valid state transitions
 */
const VALID_TRANSITIONS: Record<VoterState, VoterState[]> = {
  [VoterState.INVITED]: [VoterState.AUTHENTICATED],
  [VoterState.AUTHENTICATED]: [VoterState.VOTED],
  [VoterState.VOTED]: [], // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: VoterState, to: VoterState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Throw unless the transition is valid
 *
 * @throws CoreError with INVALID_TRANSITION
 */
export function assertTransition(from: VoterState, to: VoterState): void {
  if (!isValidTransition(from, to)) {
    throw new CoreError(
      `Invalid voter transition from ${from} to ${to}`,
      CoreErrorCode.INVALID_TRANSITION,
      { from, to }
    );
  }
}

/**
 * Expiry applies while the voter can still act; a voted record never expires
 */
export function isExpired(voter: VoterRecord, now: Date): boolean {
  return voter.state !== VoterState.VOTED && now.getTime() > Date.parse(voter.expiresAt);
}

/**
 * Check a presented second factor against the stored one
 *
 * Voters imported without a second factor always pass.
 */
export function matchesSecondFactor(voter: VoterRecord, presented: string | undefined): boolean {
  if (voter.secondFactorHash === null || voter.secondFactorSalt === null) {
    return true;
  }
  if (presented === undefined) {
    return false;
  }
  return secureCompare(hashSecret(presented, voter.secondFactorSalt), voter.secondFactorHash);
}

import type { SealedBallot } from '../../sealed-ballot.js';

/**
 * Options every route plugin receives
 */
export interface CoreRouteOptions {
  core: SealedBallot;
}

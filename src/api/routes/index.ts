/**
 * Route exports
 */

export { healthRoutes } from './health.js';
export { votingRoutes } from './voting.js';
export { auditRoutes } from './audit.js';
export { electionRoutes } from './elections.js';
export type { CoreRouteOptions } from './options.js';

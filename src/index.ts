/**
 * Sealed Ballot
 *
 * Identity/ballot separation and hash-chained audit core for small elections.
 */

export { SealedBallot, type SealedBallotConfig } from './sealed-ballot.js';

export * from './errors.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';
export { loadConfig, API_ROLES, type ApiRole, type AppConfig } from './config.js';
export { Storage, isStorageFault, GENESIS_HASH, type StorageConfig } from './storage/index.js';

export {
  ElectionRegistry,
  ElectionStatus,
  isValidElectionTransition,
  type Election,
  type ElectionBallot,
  type ElectionOption,
  type CreateElectionInput,
} from './elections/index.js';

export {
  VoterRegistry,
  VoterState,
  isValidTransition,
  assertTransition,
  DEFAULT_IDENTITY_TOKEN_TTL_HOURS,
  type VoterRecord,
  type VoterImport,
  type VoterStatus,
  type ImportResult,
  type IssuedIdentityToken,
  type StateCounts,
} from './voters/index.js';

export {
  AuditLedger,
  verifyEntries,
  computeEntryHash,
  computePayloadHash,
  type AuditEvent,
  type AuditEventType,
  type AuditExport,
  type ChainAnchor,
  type ChainIntact,
  type ChainBrokenFailure,
  type ChainVerificationResult,
} from './audit-ledger/index.js';

export {
  TokenVault,
  DEFAULT_BALLOT_TOKEN_TTL_MINUTES,
  type IssuedBallotToken,
  type RedeemedBallotToken,
  type ValidateOptions,
} from './token-vault/index.js';

export {
  BallotBox,
  TallyCursor,
  type EncryptedBallot,
  type CastReceipt,
  type ReceiptVerification,
  type TallyPage,
  type TallyGate,
} from './ballot-box/index.js';

export {
  generateElectionKeyPair,
  sealChoice,
  openChoice,
  isSealedChoice,
  type ElectionKeyPair,
} from './crypto/index.js';

export { createServer, startServer, type ServerConfig } from './api/server.js';

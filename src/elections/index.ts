/**
 * Election Registry
 *
 * Election lifecycle DRAFT → OPEN → CLOSED. Voters are imported into draft
 * or open elections, ballots are accepted only while open, and the tally is
 * readable only once closed. Every transition is recorded in the audit
 * ledger in the same transaction.
 */

import type { AuditLedger } from '../audit-ledger/index.js';
import { isElectionPublicKey } from '../crypto/index.js';
import { CoreErrorCode, fail, ok, type CoreFailure, type Result } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Storage } from '../storage/index.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { ElectionRepository } from './repository.js';
import {
  ElectionStatus,
  type CreateElectionInput,
  type Election,
  type ElectionBallot,
  type ElectionOption,
} from './types.js';

export * from './types.js';

const TITLE_MAX_LENGTH = 200;
const DESCRIPTION_MAX_LENGTH = 2000;
const OPTION_MAX_LENGTH = 255;
const MIN_OPTIONS = 2;
const MAX_OPTIONS = 50;
const ELECTION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * Valid status transitions
 */
const VALID_TRANSITIONS: Record<ElectionStatus, ElectionStatus[]> = {
  [ElectionStatus.DRAFT]: [ElectionStatus.OPEN],
  [ElectionStatus.OPEN]: [ElectionStatus.CLOSED],
  [ElectionStatus.CLOSED]: [], // Terminal state
};

export interface ElectionRegistryConfig {
  storage: Storage;
  audit: AuditLedger;
  logger?: Logger;
  clock?: Clock;
}

export class ElectionRegistry {
  private readonly storage: Storage;
  private readonly audit: AuditLedger;
  private readonly repository: ElectionRepository;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(config: ElectionRegistryConfig) {
    this.storage = config.storage;
    this.audit = config.audit;
    this.repository = new ElectionRepository(config.storage.db);
    this.logger = (config.logger ?? silentLogger()).child({ component: 'election-registry' });
    this.clock = config.clock ?? systemClock;
  }

  createElection(input: CreateElectionInput): Result<Election> {
    const title = input.title.trim();
    if (title.length === 0 || title.length > TITLE_MAX_LENGTH) {
      return fail(CoreErrorCode.INVALID_INPUT, `Title must be 1-${TITLE_MAX_LENGTH} characters`);
    }
    const description = (input.description ?? '').trim();
    if (description.length > DESCRIPTION_MAX_LENGTH) {
      return fail(CoreErrorCode.INVALID_INPUT, `Description must be at most ${DESCRIPTION_MAX_LENGTH} characters`);
    }

    // Blank entries are dropped
    const texts = input.options.map((text) => text.trim()).filter((text) => text.length > 0);
    if (texts.length < MIN_OPTIONS || texts.length > MAX_OPTIONS) {
      return fail(CoreErrorCode.INVALID_INPUT, `An election needs ${MIN_OPTIONS}-${MAX_OPTIONS} options`);
    }
    if (texts.some((text) => text.length > OPTION_MAX_LENGTH)) {
      return fail(CoreErrorCode.INVALID_INPUT, `Options must be at most ${OPTION_MAX_LENGTH} characters`);
    }
    const options: ElectionOption[] = texts.map((text, index) => ({
      optionId: `option-${index + 1}`,
      text,
      order: index + 1,
    }));

    if (!isElectionPublicKey(input.publicKey)) {
      return fail(CoreErrorCode.INVALID_INPUT, 'Public key must be a 32-byte hex X25519 key');
    }

    const electionId = input.electionId ?? crypto.randomUUID();
    if (!ELECTION_ID_PATTERN.test(electionId)) {
      return fail(CoreErrorCode.INVALID_INPUT, 'Election id may only contain letters, digits, - and _');
    }

    return this.storage.run('elections.create', () => {
      if (this.repository.get(electionId)) {
        return fail(CoreErrorCode.INVALID_INPUT, `Election ${electionId} already exists`);
      }

      const election: Election = {
        electionId,
        title,
        description,
        options,
        publicKey: input.publicKey,
        status: ElectionStatus.DRAFT,
        createdAt: this.clock().toISOString(),
        openedAt: null,
        closedAt: null,
      };
      this.repository.insert(election);
      this.audit.appendWithin({
        electionId,
        eventType: 'election.created',
        actorRef: 'election-registry',
        payload: {
          title,
          description,
          publicKey: input.publicKey,
          options: options.map((option) => ({ optionId: option.optionId, text: option.text, order: option.order })),
        },
      });

      this.logger.info({ electionId }, 'Election created');
      return ok(election);
    });
  }

  openElection(electionId: string): Result<Election> {
    return this.transition(electionId, ElectionStatus.OPEN);
  }

  closeElection(electionId: string): Result<Election> {
    return this.transition(electionId, ElectionStatus.CLOSED);
  }

  getElection(electionId: string): Result<Election> {
    return this.storage.read('elections.get', () => {
      const election = this.repository.get(electionId);
      return election ? ok(election) : notFound(electionId);
    });
  }

  listElections(): Result<Election[]> {
    return this.storage.read('elections.list', () => ok(this.repository.list()));
  }

  /**
   * The ballot a voter fills in; only while the election accepts ballots
   */
  getBallot(electionId: string): Result<ElectionBallot> {
    return this.storage.read('elections.ballot', () => {
      const election = this.requireOpenWithin(electionId);
      if (!election.ok) {
        return election;
      }
      const { title, description, options, publicKey } = election.value;
      return ok({ electionId, title, description, options, publicKey });
    });
  }

  /**
   * Gate for tally reads
   */
  isClosed(electionId: string): Result<boolean> {
    return this.storage.read('elections.isClosed', () => {
      const election = this.repository.get(electionId);
      return election ? ok(election.status === ElectionStatus.CLOSED) : notFound(electionId);
    });
  }

  /**
   * Fail unless the election accepts ballots
   *
   * For use inside another component's transaction.
   */
  requireOpenWithin(electionId: string): Result<Election> {
    const election = this.repository.get(electionId);
    if (!election) {
      return notFound(electionId);
    }
    if (election.status !== ElectionStatus.OPEN) {
      return fail(CoreErrorCode.ELECTION_NOT_OPEN, `Election ${electionId} is ${election.status}`);
    }
    return ok(election);
  }

  /**
   * Fail if the election no longer accepts voter changes
   */
  requireNotClosedWithin(electionId: string): Result<Election> {
    const election = this.repository.get(electionId);
    if (!election) {
      return notFound(electionId);
    }
    if (election.status === ElectionStatus.CLOSED) {
      return fail(CoreErrorCode.INVALID_TRANSITION, `Election ${electionId} is closed`);
    }
    return ok(election);
  }

  private transition(electionId: string, to: ElectionStatus): Result<Election> {
    return this.storage.run(`elections.${to}`, () => {
      const election = this.repository.get(electionId);
      if (!election) {
        return notFound(electionId);
      }
      if (!isValidElectionTransition(election.status, to)) {
        return fail(
          CoreErrorCode.INVALID_TRANSITION,
          `Cannot move election from ${election.status} to ${to}`,
          { from: election.status, to }
        );
      }

      const at = this.clock().toISOString();
      if (!this.repository.transition(electionId, election.status, to, at)) {
        return fail(CoreErrorCode.INVALID_TRANSITION, 'Election status changed concurrently');
      }

      this.audit.appendWithin({
        electionId,
        eventType: to === ElectionStatus.OPEN ? 'election.opened' : 'election.closed',
        actorRef: 'election-registry',
      });

      this.logger.info({ electionId, status: to }, 'Election status changed');
      return ok({
        ...election,
        status: to,
        openedAt: to === ElectionStatus.OPEN ? at : election.openedAt,
        closedAt: to === ElectionStatus.CLOSED ? at : election.closedAt,
      });
    });
  }
}

/**
 * Check if an election status transition is valid
 */
export function isValidElectionTransition(from: ElectionStatus, to: ElectionStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

function notFound(electionId: string): { ok: false; error: CoreFailure } {
  return fail(CoreErrorCode.ELECTION_NOT_FOUND, `Election ${electionId} not found`);
}

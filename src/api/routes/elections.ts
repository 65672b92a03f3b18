/**
 * Election Routes
 *
 * Administration: election lifecycle, voter import and the tally read
 */

import type { FastifyInstance } from 'fastify';
import type { Election } from '../../elections/index.js';
import type { ImportResult, IssuedIdentityToken } from '../../voters/index.js';
import { orThrow, requireRole } from '../middleware/index.js';
import {
  CreateElectionSchema,
  ElectionParamsSchema,
  ImportVotersSchema,
  ReissueTokenSchema,
  TallyQuerySchema,
  type ElectionDetailResponse,
  type ElectionResponse,
  type TallyResponse,
} from '../types.js';
import type { CoreRouteOptions } from './options.js';

/**
 * Convert an election to its response shape
 */
function toElectionResponse(election: Election): ElectionResponse {
  return {
    electionId: election.electionId,
    title: election.title,
    description: election.description,
    options: election.options,
    publicKey: election.publicKey,
    status: election.status,
    createdAt: election.createdAt,
    openedAt: election.openedAt,
    closedAt: election.closedAt,
  };
}

export async function electionRoutes(fastify: FastifyInstance, { core }: CoreRouteOptions): Promise<void> {
  const adminOnly = { preHandler: requireRole('admin') };

  /**
   * POST /v1/elections
   * Create a draft election
   */
  fastify.post<{
    Body: unknown;
    Reply: ElectionResponse;
  }>('/v1/elections', adminOnly, async (request, reply) => {
    const body = CreateElectionSchema.parse(request.body);
    const election = orThrow(core.elections.createElection(body));
    reply.status(201).send(toElectionResponse(election));
  });

  /**
   * GET /v1/elections
   */
  fastify.get<{
    Reply: { elections: ElectionResponse[] };
  }>('/v1/elections', adminOnly, async (_request, reply) => {
    const elections = orThrow(core.elections.listElections());
    reply.send({ elections: elections.map(toElectionResponse) });
  });

  /**
   * GET /v1/elections/:id
   * Election with voter and ballot counts
   */
  fastify.get<{
    Params: unknown;
    Reply: ElectionDetailResponse;
  }>('/v1/elections/:id', adminOnly, async (request, reply) => {
    const { id } = ElectionParamsSchema.parse(request.params);
    const election = orThrow(core.elections.getElection(id));

    reply.send({
      ...toElectionResponse(election),
      voters: orThrow(core.voters.countByState(id)),
      ballotsCast: orThrow(core.ballots.countBallots(id)),
    });
  });

  /**
   * POST /v1/elections/:id/open
   */
  fastify.post<{
    Params: unknown;
    Reply: ElectionResponse;
  }>('/v1/elections/:id/open', adminOnly, async (request, reply) => {
    const { id } = ElectionParamsSchema.parse(request.params);
    reply.send(toElectionResponse(orThrow(core.elections.openElection(id))));
  });

  /**
   * POST /v1/elections/:id/close
   */
  fastify.post<{
    Params: unknown;
    Reply: ElectionResponse;
  }>('/v1/elections/:id/close', adminOnly, async (request, reply) => {
    const { id } = ElectionParamsSchema.parse(request.params);
    reply.send(toElectionResponse(orThrow(core.elections.closeElection(id))));
  });

  /**
   * POST /v1/elections/:id/voters
   * Import voters; identity tokens are returned once, for delivery
   */
  fastify.post<{
    Params: unknown;
    Body: unknown;
    Reply: ImportResult;
  }>('/v1/elections/:id/voters', adminOnly, async (request, reply) => {
    const { id } = ElectionParamsSchema.parse(request.params);
    const body = ImportVotersSchema.parse(request.body);
    const result = orThrow(core.voters.importVoters(id, body.voters, { ttlHours: body.ttlHours }));
    reply.status(201).send(result);
  });

  /**
   * POST /v1/elections/:id/voters/reissue
   * Replace a voter's identity token
   */
  fastify.post<{
    Params: unknown;
    Body: unknown;
    Reply: IssuedIdentityToken;
  }>('/v1/elections/:id/voters/reissue', adminOnly, async (request, reply) => {
    const { id } = ElectionParamsSchema.parse(request.params);
    const body = ReissueTokenSchema.parse(request.body);
    reply.send(orThrow(core.voters.reissueIdentityToken(id, body.externalRef, { ttlHours: body.ttlHours })));
  });

  /**
   * GET /v1/elections/:id/tally
   * Page through the sealed ballots of a closed election
   */
  fastify.get<{
    Params: unknown;
    Querystring: unknown;
    Reply: TallyResponse;
  }>('/v1/elections/:id/tally', adminOnly, async (request, reply) => {
    const { id } = ElectionParamsSchema.parse(request.params);
    const query = TallyQuerySchema.parse(request.query);
    const page = orThrow(
      core.ballots.readTallyPage(id, query, (electionId) => core.elections.isClosed(electionId))
    );

    reply.send({
      electionId: page.electionId,
      ballots: page.ballots.map((ballot) => ({
        ballotId: ballot.ballotId,
        encryptedChoice: ballot.encryptedChoice,
        ballotHash: ballot.ballotHash,
        castAt: ballot.castAt,
      })),
      nextCursor: page.nextCursor,
    });
  });
}

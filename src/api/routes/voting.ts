/**
 * Voting Routes
 *
 * Endpoints the voting gateway calls on behalf of voters: fetching the
 * ballot, exchanging an identity token for a ballot token, casting, and
 * checking a receipt
 */

import type { FastifyInstance } from 'fastify';
import { orThrow, requireRole } from '../middleware/index.js';
import {
  CastBallotSchema,
  ElectionParamsSchema,
  ReceiptParamsSchema,
  ValidateIdentitySchema,
  type BallotResponse,
  type CastReceiptResponse,
  type IssuedBallotTokenResponse,
} from '../types.js';
import type { ReceiptVerification } from '../../ballot-box/index.js';
import type { CoreRouteOptions } from './options.js';

export async function votingRoutes(fastify: FastifyInstance, { core }: CoreRouteOptions): Promise<void> {
  const gatewayOnly = { preHandler: requireRole('gateway') };

  /**
   * GET /v1/elections/:id/ballot
   * Title, options and encryption key of an open election
   */
  fastify.get<{
    Params: unknown;
    Reply: BallotResponse;
  }>('/v1/elections/:id/ballot', gatewayOnly, async (request, reply) => {
    const { id } = ElectionParamsSchema.parse(request.params);
    reply.send(orThrow(core.getBallot(id)));
  });

  /**
   * POST /v1/identity/validate
   * Validate an identity token and issue a ballot token
   */
  fastify.post<{
    Body: unknown;
    Reply: IssuedBallotTokenResponse;
  }>('/v1/identity/validate', gatewayOnly, async (request, reply) => {
    const body = ValidateIdentitySchema.parse(request.body);
    const issued = orThrow(core.authenticateAndIssue(body.identityToken, { secondFactor: body.secondFactor }));

    const response: IssuedBallotTokenResponse = {
      ballotToken: issued.ballotToken,
      electionId: issued.electionId,
      expiresAt: issued.expiresAt,
    };
    reply.send(response);
  });

  /**
   * POST /v1/ballots
   * Cast a sealed ballot
   */
  fastify.post<{
    Body: unknown;
    Reply: CastReceiptResponse;
  }>('/v1/ballots', gatewayOnly, async (request, reply) => {
    const body = CastBallotSchema.parse(request.body);
    const cast = orThrow(core.castBallot(body.ballotToken, body.encryptedChoice));

    const response: CastReceiptResponse = {
      receipt: cast.receipt,
      ballotHash: cast.ballotHash,
      castAt: cast.castAt,
    };
    reply.status(201).send(response);
  });

  /**
   * GET /v1/receipts/:receipt
   * Confirm that the ballot behind a receipt is stored
   */
  fastify.get<{
    Params: unknown;
    Reply: ReceiptVerification;
  }>('/v1/receipts/:receipt', gatewayOnly, async (request, reply) => {
    const { receipt } = ReceiptParamsSchema.parse(request.params);
    reply.send(orThrow(core.verifyReceipt(receipt)));
  });
}

/**
 * Audit Routes
 *
 * Chain verification and ledger export for independent auditors
 */

import type { FastifyInstance } from 'fastify';
import { CoreErrorCode } from '../../errors.js';
import { fromFailure, orThrow, requireRole } from '../middleware/index.js';
import {
  AuditVerifyQuerySchema,
  ElectionParamsSchema,
  type AuditExportResponse,
  type AuditVerifyResponse,
} from '../types.js';
import type { CoreRouteOptions } from './options.js';

export async function auditRoutes(fastify: FastifyInstance, { core }: CoreRouteOptions): Promise<void> {
  const auditors = { preHandler: requireRole('auditor', 'admin') };

  /**
   * GET /v1/elections/:id/audit/verify
   * Recompute the election's hash chain
   */
  fastify.get<{
    Params: unknown;
    Querystring: unknown;
    Reply: AuditVerifyResponse;
  }>('/v1/elections/:id/audit/verify', auditors, async (request, reply) => {
    const { id } = ElectionParamsSchema.parse(request.params);
    const query = AuditVerifyQuerySchema.parse(request.query);
    orThrow(core.elections.getElection(id));

    const anchor =
      query.anchorSequence !== undefined && query.anchorHash !== undefined
        ? { sequenceNo: query.anchorSequence, entryHash: query.anchorHash }
        : undefined;
    const result = core.verifyAudit(id, { anchor });

    if (result.ok) {
      reply.send({ ok: true, electionId: id, length: result.value.length, headHash: result.value.headHash });
      return;
    }
    if (result.error.code === CoreErrorCode.CHAIN_BROKEN) {
      reply.send({ ok: false, electionId: id, brokenAt: result.error.atSequence, reason: result.error.reason });
      return;
    }
    throw fromFailure(result.error);
  });

  /**
   * GET /v1/elections/:id/audit
   * Export the full ledger for offline verification
   */
  fastify.get<{
    Params: unknown;
    Reply: AuditExportResponse;
  }>('/v1/elections/:id/audit', auditors, async (request, reply) => {
    const { id } = ElectionParamsSchema.parse(request.params);
    orThrow(core.elections.getElection(id));
    reply.send(orThrow(core.audit.export(id)));
  });
}

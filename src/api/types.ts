/**
 * API Types for the Sealed Ballot REST API
 *
 * Request schemas and response shapes for all endpoints
 */

import { z } from 'zod';
import type { AuditEvent, ChainBreakReason } from '../audit-ledger/index.js';
import type { ElectionOption, ElectionStatus } from '../elections/index.js';
import type { StateCounts } from '../voters/index.js';

export const API_VERSION = '0.1.0';

// =============================================================================
// Request Schemas
// =============================================================================

const token = z.string().min(1).max(256);

export const ValidateIdentitySchema = z.object({
  identityToken: token,
  secondFactor: z.string().min(1).max(256).optional(),
});

export type ValidateIdentityRequest = z.infer<typeof ValidateIdentitySchema>;

export const CastBallotSchema = z.object({
  ballotToken: token,
  encryptedChoice: z.string().min(1),
});

export type CastBallotRequest = z.infer<typeof CastBallotSchema>;

export const CreateElectionSchema = z.object({
  title: z.string().min(1).max(200),
  description: z.string().max(2000).optional(),
  options: z.array(z.string().max(255)).min(2).max(50),
  publicKey: z.string(),
  electionId: z.string().min(1).max(64).optional(),
});

export type CreateElectionRequest = z.infer<typeof CreateElectionSchema>;

export const ImportVotersSchema = z.object({
  voters: z
    .array(
      z.object({
        externalRef: z.string().min(1).max(320),
        secondFactor: z.string().min(1).max(256).optional(),
      })
    )
    .min(1)
    .max(10_000),
  ttlHours: z.number().positive().optional(),
});

export type ImportVotersRequest = z.infer<typeof ImportVotersSchema>;

export const ReissueTokenSchema = z.object({
  externalRef: z.string().min(1).max(320),
  ttlHours: z.number().positive().optional(),
});

export type ReissueTokenRequest = z.infer<typeof ReissueTokenSchema>;

export const ElectionParamsSchema = z.object({
  id: z.string().min(1).max(64),
});

export const ReceiptParamsSchema = z.object({
  receipt: z.string().min(1).max(256),
});

export const TallyQuerySchema = z.object({
  after: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().positive().optional(),
});

export const AuditVerifyQuerySchema = z
  .object({
    anchorSequence: z.coerce.number().int().positive().optional(),
    anchorHash: z.string().regex(/^[0-9a-f]{64}$/).optional(),
  })
  .refine(
    (query) => (query.anchorSequence === undefined) === (query.anchorHash === undefined),
    { message: 'anchorSequence and anchorHash go together' }
  );

// =============================================================================
// Response Types
// =============================================================================

export interface IssuedBallotTokenResponse {
  ballotToken: string;
  electionId: string;
  expiresAt: string;
}

export interface CastReceiptResponse {
  receipt: string;
  ballotHash: string;
  castAt: string;
}

export interface ElectionResponse {
  electionId: string;
  title: string;
  description: string;
  options: ElectionOption[];
  publicKey: string;
  status: ElectionStatus;
  createdAt: string;
  openedAt: string | null;
  closedAt: string | null;
}

export interface BallotResponse {
  electionId: string;
  title: string;
  description: string;
  options: ElectionOption[];
  publicKey: string;
}

export interface ElectionDetailResponse extends ElectionResponse {
  voters: StateCounts;
  ballotsCast: number;
}

export type AuditVerifyResponse =
  | { ok: true; electionId: string; length: number; headHash: string }
  | { ok: false; electionId: string; brokenAt: number; reason: ChainBreakReason };

export interface AuditExportResponse {
  electionId: string;
  exportedAt: string;
  head: { sequenceNo: number; entryHash: string } | null;
  verification: { intact: true; length: number } | { intact: false; atSequence: number; reason: ChainBreakReason };
  events: AuditEvent[];
}

export interface TallyResponse {
  electionId: string;
  ballots: Array<{
    ballotId: number;
    encryptedChoice: string;
    ballotHash: string;
    castAt: string;
  }>;
  nextCursor: number | null;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
}

/**
 * Error response
 */
export interface ErrorResponse {
  error: {
    message: string;
    code?: string;
    statusCode: number;
  };
}

/**
 * Evaluation Endpoints
 *
 * POST /api/v1/evaluations scores and compares every vendor in the evidence
 * set; POST /api/v1/evaluations/vendors/:vendorId scores a single vendor.
 * Evidence records are validated one by one: a bad record rejects only its
 * vendor, which is reported under failures.
 */

import { Router, Response, NextFunction } from 'express';
import { z } from 'zod';
import { EvidenceStore, type EvidenceRejection } from '@proposal-eval/scoring-service';
import {
  analyzeComparisons,
  explainVendor,
  generateDisqualificationReason,
} from '@proposal-eval/explainability';
import type { EvaluationService } from '../services/evaluation-service.js';
import { handleRouteError, type ContextualRequest } from '../middleware/request-context.js';
import { buildScorecard, ScorecardInputSchema } from './scorecards.js';

/**
 * Maximum evidence records accepted per request
 */
export const MAX_EVIDENCE_RECORDS = 10000;

const EvidenceListSchema = z.object({
  evidence: z.array(z.unknown()).max(MAX_EVIDENCE_RECORDS).default([]),
  vendorIds: z
    .array(z.string().min(1).max(200))
    .min(1)
    .refine((ids) => new Set(ids).size === ids.length, { message: 'vendorIds must be unique' })
    .optional(),
});

export const EvaluationRequestSchema = z.intersection(ScorecardInputSchema, EvidenceListSchema);

/**
 * Rejected evidence record as returned to the caller
 */
export interface RejectedEvidence {
  index: number;
  vendorId?: string;
  criterionId?: string;
  errorCode: string;
  message: string;
}

export function toRejectedEvidence(rejections: readonly EvidenceRejection[]): RejectedEvidence[] {
  return rejections.map((rejection) => ({
    index: rejection.index,
    vendorId: rejection.vendorId,
    criterionId: rejection.criterionId,
    errorCode: rejection.error.code,
    message: rejection.error.message,
  }));
}

/**
 * Creates the evaluation router
 */
export function createEvaluationsRouter(service: EvaluationService): Router {
  const router = Router();

  router.post('/', async (req: ContextualRequest, res: Response, next: NextFunction) => {
    try {
      const input = EvaluationRequestSchema.parse(req.body);
      const scorecard = buildScorecard(input, service.getConfig().weightTolerance);
      const evidenceStore = new EvidenceStore(scorecard);
      const { rejected } = evidenceStore.ingest(input.evidence);

      const result = await service.evaluate({
        scorecard,
        evidenceStore,
        vendorIds: input.vendorIds,
        correlationId: req.context?.correlationId,
      });

      res.status(200).json({
        evaluationId: result.evaluationId,
        correlationId: result.correlationId,
        report: result.report,
        summary: result.summary,
        analysis: analyzeComparisons(result.report),
        rejectedEvidence: toRejectedEvidence(rejected),
        cacheHit: result.cacheHit,
        processingTimeMs: result.processingTimeMs,
      });
    } catch (error) {
      handleRouteError(error, req, res, next);
    }
  });

  router.post('/vendors/:vendorId', (req: ContextualRequest, res: Response, next: NextFunction) => {
    try {
      const vendorId = req.params.vendorId;
      const input = EvaluationRequestSchema.parse(req.body);
      const config = service.getConfig();
      const scorecard = buildScorecard(input, config.weightTolerance);
      const evidenceStore = new EvidenceStore(scorecard);
      evidenceStore.ingest(input.evidence);

      const summary = service.scoreSingleVendor(vendorId, scorecard, evidenceStore);

      res.status(200).json({
        vendorId,
        summary,
        explanation: explainVendor(summary, undefined, {
          verboseMode: true,
          confidenceBands: config.confidenceBands,
          lowConfidenceThreshold: config.lowConfidenceThreshold,
        }),
        disqualification: generateDisqualificationReason(summary),
        correlationId: req.context?.correlationId,
      });
    } catch (error) {
      handleRouteError(error, req, res, next);
    }
  });

  return router;
}

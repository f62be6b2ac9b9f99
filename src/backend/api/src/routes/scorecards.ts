/**
 * Scorecard Endpoints
 *
 * POST /api/v1/scorecards/validate checks a weighted or point-allocation
 * scorecard descriptor and returns its normalized weighted form.
 */

import { Router, Response, NextFunction } from 'express';
import { z } from 'zod';
import { Scorecard } from '@proposal-eval/scoring-service';
import type { EvaluationService } from '../services/evaluation-service.js';
import { handleRouteError, type ContextualRequest } from '../middleware/request-context.js';

/**
 * Either descriptor form; the weighted form wins when both are given
 */
export const ScorecardInputSchema = z
  .object({
    scorecard: z.unknown().optional(),
    pointsScorecard: z.unknown().optional(),
  })
  .refine((body) => body.scorecard !== undefined || body.pointsScorecard !== undefined, {
    message: 'scorecard or pointsScorecard is required',
    path: ['scorecard'],
  });

export type ScorecardInput = z.infer<typeof ScorecardInputSchema>;

/**
 * Builds a scorecard from a request body.
 * Throws InvalidScorecardError for descriptors that fail validation.
 */
export function buildScorecard(input: ScorecardInput, weightTolerance: number): Scorecard {
  if (input.scorecard !== undefined) {
    return Scorecard.fromDescriptor(input.scorecard, { weightTolerance });
  }
  return Scorecard.fromPointsDescriptor(input.pointsScorecard, { weightTolerance });
}

/**
 * Creates the scorecard router
 */
export function createScorecardsRouter(service: EvaluationService): Router {
  const router = Router();

  router.post('/validate', (req: ContextualRequest, res: Response, next: NextFunction) => {
    try {
      const input = ScorecardInputSchema.parse(req.body);
      const scorecard = buildScorecard(input, service.getConfig().weightTolerance);

      res.status(200).json({
        valid: true,
        scorecard: scorecard.toDescriptor(),
        categoryCount: scorecard.categories.length,
        criterionCount: scorecard.criteria().length,
        correlationId: req.context?.correlationId,
      });
    } catch (error) {
      handleRouteError(error, req, res, next);
    }
  });

  return router;
}

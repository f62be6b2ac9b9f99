/**
 * Request Context and Error Responses
 *
 * Correlation IDs for end-to-end tracing, field-level validation details
 * and the mapping of engine errors onto HTTP responses.
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ZodError } from 'zod';
import {
  EvaluationErrorCode,
  InvalidEvidenceError,
  InvalidScorecardError,
  isEvaluationError,
  type MetricsCollector,
} from '@proposal-eval/shared';

/**
 * Request context for tracking correlation IDs
 */
export interface RequestContext {
  correlationId: string;
  requestId: string;
  startTime: number;
}

/**
 * Extended request with context
 */
export interface ContextualRequest extends Request {
  context?: RequestContext;
}

/**
 * Field-level error detail
 */
export interface ErrorDetail {
  field: string;
  message: string;
  code: string;
}

/**
 * API error response format
 */
export interface ApiErrorResponse {
  error: string;
  message: string;
  correlationId?: string;
  details?: ErrorDetail[];
}

/**
 * Adds a request context, reusing the caller's X-Correlation-ID when present
 */
export function addRequestContext(req: ContextualRequest, res: Response, next: NextFunction): void {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header.length > 0 ? header : uuidv4();

  req.context = {
    correlationId,
    requestId: uuidv4(),
    startTime: Date.now(),
  };

  res.setHeader('X-Correlation-ID', req.context.correlationId);
  res.setHeader('X-Request-ID', req.context.requestId);
  next();
}

/**
 * Records latency and server errors for every request
 */
export function requestMetrics(metrics: MetricsCollector) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const stopTimer = metrics.startTimer();

    res.on('finish', () => {
      const tags = { method: req.method, status: String(res.statusCode) };
      metrics.recordRequestLatency(stopTimer().durationMs, tags);
      if (res.statusCode >= 500) {
        metrics.recordRequestError(tags);
      }
    });

    next();
  };
}

/**
 * Formats Zod validation errors into field-level error details
 */
export function formatValidationErrors(error: ZodError): ErrorDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Creates an error response body
 */
export function createErrorResponse(
  error: string,
  message: string,
  correlationId?: string,
  details?: ErrorDetail[]
): ApiErrorResponse {
  const response: ApiErrorResponse = { error, message };

  if (correlationId) {
    response.correlationId = correlationId;
  }

  if (details && details.length > 0) {
    response.details = details;
  }

  return response;
}

/**
 * Sends 400 for malformed requests and 422 for engine errors; anything else
 * goes to the global error handler
 */
export function handleRouteError(
  error: unknown,
  req: ContextualRequest,
  res: Response,
  next: NextFunction
): void {
  const correlationId = req.context?.correlationId;

  if (error instanceof ZodError) {
    res
      .status(400)
      .json(
        createErrorResponse(
          'ValidationError',
          'Request validation failed',
          correlationId,
          formatValidationErrors(error)
        )
      );
    return;
  }

  if (error instanceof InvalidScorecardError || error instanceof InvalidEvidenceError) {
    const field = error instanceof InvalidScorecardError ? 'scorecard' : 'evidence';
    const { code, violations } = error;
    res.status(422).json(
      createErrorResponse(
        error.name.replace(/Error$/, ''),
        error.message,
        correlationId,
        violations.map((violation) => ({ field, message: violation, code }))
      )
    );
    return;
  }

  if (isEvaluationError(error)) {
    const name =
      error.code === EvaluationErrorCode.UNKNOWN_CRITERION ? 'UnknownCriterion' : 'EvaluationError';
    res.status(422).json(createErrorResponse(name, error.message, correlationId));
    return;
  }

  next(error);
}

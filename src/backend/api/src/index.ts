/**
 * API Layer Entry Point
 *
 * REST API of the proposal evaluation engine.
 * Configures Express with middleware, routes, and OpenAPI documentation.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import path from 'path';
import {
  createMetricsCollector,
  getLogger,
  loadEngineConfig,
  type Logger,
  type MetricsCollector,
} from '@proposal-eval/shared';

// Routes
import { createEvaluationsRouter } from './routes/evaluations.js';
import { createScorecardsRouter } from './routes/scorecards.js';
import { createHealthRouter, HealthCheckService, ReportCacheHealthChecker } from './routes/health.js';

// Middleware
import {
  addRequestContext,
  createErrorResponse,
  requestMetrics,
  type ContextualRequest,
} from './middleware/request-context.js';

// Services
import { EvaluationService } from './services/evaluation-service.js';

export const VERSION = '1.0.0';

/**
 * API configuration
 */
export interface ApiConfig {
  port: number;
  enableSwagger: boolean;
  logger: Logger;
  metrics: MetricsCollector;
  /** Built from the environment when omitted */
  evaluationService?: EvaluationService;
}

/**
 * Default API configuration
 */
export function defaultApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return {
    port: parseInt(env.PORT || '3000', 10),
    enableSwagger: env.ENABLE_SWAGGER !== 'false',
    logger: getLogger(),
    metrics: createMetricsCollector(),
  };
}

/**
 * Creates and configures the Express application
 */
export function createApp(config: Partial<ApiConfig> = {}): Express {
  const fullConfig: ApiConfig = { ...defaultApiConfig(), ...config };
  const { logger, metrics } = fullConfig;
  const evaluationService =
    fullConfig.evaluationService ??
    new EvaluationService({ config: loadEngineConfig(), logger, metrics });
  const healthService = new HealthCheckService({
    version: VERSION,
    dependencyCheckers: [new ReportCacheHealthChecker(() => evaluationService.cacheSize())],
  });

  const app = express();

  // Basic middleware
  app.use(express.json({ limit: '10mb' }));
  app.use(addRequestContext);
  app.use(requestMetrics(metrics));

  // CORS headers (configure as needed for production)
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Correlation-ID');
    next();
  });

  // Handle preflight requests
  app.options('*', (_req: Request, res: Response) => {
    res.sendStatus(204);
  });

  // Health, readiness and liveness probes
  app.use(createHealthRouter(healthService));

  // Metrics snapshot
  app.get('/metrics', (_req: Request, res: Response) => {
    res.json(metrics.getSummary());
  });

  // OpenAPI/Swagger documentation (if enabled)
  if (fullConfig.enableSwagger) {
    try {
      const openapiPath = path.join(process.cwd(), 'src/backend/api/src/openapi.yaml');
      const swaggerDocument = YAML.load(openapiPath);
      app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument));
      app.get('/api-docs.json', (_req: Request, res: Response) => {
        res.json(swaggerDocument);
      });
    } catch (error) {
      logger.warn('Failed to load OpenAPI document', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const apiRouter = express.Router();
  apiRouter.use('/scorecards', createScorecardsRouter(evaluationService));
  apiRouter.use('/evaluations', createEvaluationsRouter(evaluationService));
  app.use('/api/v1', apiRouter);

  // 404 handler
  app.use((req: ContextualRequest, res: Response) => {
    res
      .status(404)
      .json(
        createErrorResponse(
          'NotFound',
          'The requested resource was not found',
          req.context?.correlationId
        )
      );
  });

  // Global error handler
  app.use((err: Error, req: ContextualRequest, res: Response, _next: NextFunction) => {
    if ('type' in err && err.type === 'entity.parse.failed') {
      res
        .status(400)
        .json(createErrorResponse('ValidationError', 'Malformed JSON body', req.context?.correlationId));
      return;
    }

    logger.error('Unhandled error', err, { path: req.path });
    res
      .status(500)
      .json(
        createErrorResponse(
          'InternalError',
          'An unexpected error occurred',
          req.context?.correlationId
        )
      );
  });

  return app;
}

/**
 * Starts the API server
 */
export function startServer(config: Partial<ApiConfig> = {}): void {
  const fullConfig: ApiConfig = { ...defaultApiConfig(), ...config };
  const app = createApp(fullConfig);

  app.listen(fullConfig.port, () => {
    fullConfig.logger.info('Proposal evaluation API listening', {
      port: fullConfig.port,
      swagger: fullConfig.enableSwagger,
    });
  });
}

export { EvaluationService } from './services/evaluation-service.js';
export type {
  CachedEvaluation,
  EvaluationRequest,
  EvaluationResult,
  EvaluationServiceDeps,
} from './services/evaluation-service.js';
export { createEvaluationsRouter, EvaluationRequestSchema } from './routes/evaluations.js';
export { createScorecardsRouter, ScorecardInputSchema } from './routes/scorecards.js';
export * from './middleware/index.js';

// Start server if run directly
if (process.argv[1] && process.argv[1].endsWith('api/src/index.js')) {
  startServer();
}

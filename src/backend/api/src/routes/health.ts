/**
 * Health Check Endpoints
 *
 * Liveness, readiness and dependency health for probes and monitoring.
 * The report cache is the only runtime dependency of the engine.
 */

import { Router, Request, Response } from 'express';

/**
 * Health status enumeration
 */
export const HealthStatus = {
  HEALTHY: 'healthy',
  UNHEALTHY: 'unhealthy',
  DEGRADED: 'degraded',
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

/**
 * Dependency health check result
 */
export interface DependencyHealth {
  name: string;
  status: HealthStatus;
  latencyMs?: number;
  message?: string;
  lastChecked: string;
}

/**
 * Overall health check response
 */
export interface HealthCheckResponse {
  status: HealthStatus;
  version: string;
  timestamp: string;
  uptime: number;
  dependencies: DependencyHealth[];
}

export interface LivenessResponse {
  alive: boolean;
  timestamp: string;
}

export interface ReadinessResponse {
  ready: boolean;
  timestamp: string;
  checks: Record<string, boolean>;
}

/**
 * Dependency checker interface
 */
export interface DependencyChecker {
  name: string;
  check(): Promise<DependencyHealth>;
}

export interface HealthCheckConfig {
  version: string;
  dependencyCheckers: DependencyChecker[];
  startTime: Date;
}

export const defaultHealthConfig: HealthCheckConfig = {
  version: '1.0.0',
  dependencyCheckers: [],
  startTime: new Date(),
};

/**
 * Report cache health checker; a failing cache degrades but never blocks
 * evaluations, which recompute on a miss
 */
export class ReportCacheHealthChecker implements DependencyChecker {
  name = 'reportCache';
  private checkFn: () => Promise<unknown>;

  constructor(checkFn: () => Promise<unknown>) {
    this.checkFn = checkFn;
  }

  async check(): Promise<DependencyHealth> {
    const startTime = Date.now();
    try {
      await this.checkFn();
      return {
        name: this.name,
        status: HealthStatus.HEALTHY,
        latencyMs: Date.now() - startTime,
        lastChecked: new Date().toISOString(),
      };
    } catch (error) {
      return {
        name: this.name,
        status: HealthStatus.DEGRADED,
        latencyMs: Date.now() - startTime,
        message: error instanceof Error ? error.message : 'Unknown error',
        lastChecked: new Date().toISOString(),
      };
    }
  }
}

/**
 * Health check service
 */
export class HealthCheckService {
  private config: HealthCheckConfig;

  constructor(config: Partial<HealthCheckConfig> = {}) {
    this.config = { ...defaultHealthConfig, ...config };
  }

  getUptime(): number {
    return Math.floor((Date.now() - this.config.startTime.getTime()) / 1000);
  }

  checkLiveness(): LivenessResponse {
    return {
      alive: true,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Ready unless a dependency is unhealthy; degraded dependencies still serve
   */
  async checkReadiness(): Promise<ReadinessResponse> {
    const dependencies = await this.checkDependencies();
    const checks: Record<string, boolean> = {};

    for (const dep of dependencies) {
      checks[dep.name] = dep.status !== HealthStatus.UNHEALTHY;
    }

    return {
      ready: Object.values(checks).every(Boolean),
      timestamp: new Date().toISOString(),
      checks,
    };
  }

  async checkDependencies(): Promise<DependencyHealth[]> {
    const results: DependencyHealth[] = [];

    for (const checker of this.config.dependencyCheckers) {
      try {
        results.push(await checker.check());
      } catch (error) {
        results.push({
          name: checker.name,
          status: HealthStatus.UNHEALTHY,
          message: error instanceof Error ? error.message : 'Unknown error',
          lastChecked: new Date().toISOString(),
        });
      }
    }

    return results;
  }

  async checkHealth(): Promise<HealthCheckResponse> {
    const dependencies = await this.checkDependencies();

    let status: HealthStatus = HealthStatus.HEALTHY;
    if (dependencies.some((dep) => dep.status === HealthStatus.UNHEALTHY)) {
      status = HealthStatus.UNHEALTHY;
    } else if (dependencies.some((dep) => dep.status === HealthStatus.DEGRADED)) {
      status = HealthStatus.DEGRADED;
    }

    return {
      status,
      version: this.config.version,
      timestamp: new Date().toISOString(),
      uptime: this.getUptime(),
      dependencies,
    };
  }
}

/**
 * Creates the health router: GET /health, /ready and /live
 */
export function createHealthRouter(healthService: HealthCheckService): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const health = await healthService.checkHealth();
    res.status(health.status === HealthStatus.UNHEALTHY ? 503 : 200).json(health);
  });

  router.get('/ready', async (_req: Request, res: Response) => {
    const readiness = await healthService.checkReadiness();
    res.status(readiness.ready ? 200 : 503).json(readiness);
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json(healthService.checkLiveness());
  });

  return router;
}

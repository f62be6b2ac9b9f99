/**
 * Structured Logging Module
 *
 * Structured JSON logging with correlation IDs, an optional telemetry sink,
 * and masking of contact details that proposals routinely carry (vendor
 * emails, phone numbers, named contacts) before anything is written.
 */

import { z } from 'zod';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Contact-detail patterns masked in log strings.
 * Phone numbers must be formatted (parentheses or a +country prefix) so that
 * criterion ids and numeric claims such as "99.95" are left alone.
 */
export const CONTACT_PATTERNS = {
  email: /[a-zA-Z0-9][a-zA-Z0-9._%+-]*@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /(?:\+\d{1,3}[-.\s]?\d{2,4}[-.\s]?\d{3,4}[-.\s]?\d{3,4}|\(\d{3}\)[-.\s]?\d{3}[-.\s]?\d{4})/g,
} as const;

/**
 * Metadata keys whose values are replaced wholesale
 */
export const SENSITIVE_FIELD_NAMES = [
  'email',
  'phone',
  'contactName',
  'primaryContact',
  'signatory',
  'password',
  'secret',
  'token',
  'apiKey',
] as const;

/**
 * Structured log entry schema
 */
export const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: LogLevelSchema,
  message: z.string(),
  correlationId: z.string().optional(),
  service: z.string(),
  metadata: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      code: z.string().optional(),
      stack: z.string().optional(),
    })
    .optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

/**
 * Summary of one evaluation run, logged once per run
 */
export interface EvaluationLogEntry {
  correlationId: string;
  evaluationId: string;
  vendorCount: number;
  criterionCount: number;
  evidenceCount: number;
  scoredVendors: number;
  failedVendors: string[];
  disqualifiedVendors: string[];
  cacheHit: boolean;
  processingTimeMs: number;
}

/**
 * Telemetry sink interface
 */
export interface TelemetryClient {
  trackTrace(message: string, severity: number, properties?: Record<string, string>): void;
  trackException(exception: Error, properties?: Record<string, string>): void;
  trackMetric(name: string, value: number, properties?: Record<string, string>): void;
  flush(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  serviceName: string;
  minLevel: LogLevel;
  enableConsole: boolean;
  enableTelemetry: boolean;
  telemetryClient?: TelemetryClient;
  maskContactDetails: boolean;
}

/**
 * Default logger configuration
 */
export const defaultLoggerConfig: LoggerConfig = {
  serviceName: 'proposal-evaluation',
  minLevel: LogLevel.INFO,
  enableConsole: true,
  enableTelemetry: false,
  maskContactDetails: true,
};

/**
 * Masks contact details in a string value
 */
export function maskContactDetailsInString(value: string): string {
  return value
    .replace(CONTACT_PATTERNS.email, '[EMAIL_MASKED]')
    .replace(CONTACT_PATTERNS.phone, '[PHONE_MASKED]');
}

/**
 * Checks whether a metadata key names a sensitive field
 */
export function isSensitiveFieldName(fieldName: string): boolean {
  const lower = fieldName.toLowerCase();
  return SENSITIVE_FIELD_NAMES.some((field) => lower.includes(field.toLowerCase()));
}

/**
 * Masks contact details in an object recursively
 */
export function maskContactDetailsInObject(obj: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return maskContactDetailsInString(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskContactDetailsInObject(item, depth + 1));
  }

  if (typeof obj === 'object') {
    const masked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (isSensitiveFieldName(key) && value !== null && value !== undefined) {
        masked[key] = '[MASKED]';
      } else {
        masked[key] = maskContactDetailsInObject(value, depth + 1);
      }
    }
    return masked;
  }

  return obj;
}

function maskMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    masked[key] = isSensitiveFieldName(key) ? '[MASKED]' : maskContactDetailsInObject(value, 1);
  }
  return masked;
}

/**
 * Converts log level to telemetry severity
 */
function logLevelToSeverity(level: LogLevel): number {
  switch (level) {
    case LogLevel.DEBUG:
      return 0;
    case LogLevel.INFO:
      return 1;
    case LogLevel.WARN:
      return 2;
    case LogLevel.ERROR:
      return 3;
  }
}

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  const levels: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
  return levels.indexOf(level) >= levels.indexOf(minLevel);
}

/**
 * Structured Logger
 */
export class Logger {
  private config: LoggerConfig;
  private correlationId?: string;
  private logEntries: LogEntry[] = [];

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...defaultLoggerConfig, ...config };
  }

  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  getCorrelationId(): string | undefined {
    return this.correlationId;
  }

  /**
   * Creates a child logger bound to a correlation ID
   */
  child(correlationId: string): Logger {
    const childLogger = new Logger(this.config);
    childLogger.setCorrelationId(correlationId);
    return childLogger;
  }

  /**
   * Gets all log entries (for testing)
   */
  getLogEntries(): LogEntry[] {
    return [...this.logEntries];
  }

  clearLogEntries(): void {
    this.logEntries = [];
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.serviceName,
      correlationId: this.correlationId,
    };

    if (metadata) {
      entry.metadata = this.config.maskContactDetails ? maskMetadata(metadata) : metadata;
    }

    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: this.config.maskContactDetails
          ? maskContactDetailsInString(error.message)
          : error.message,
        code,
        stack: error.stack,
      };
    }

    return entry;
  }

  private log(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.config.minLevel)) {
      return;
    }

    const entry = this.createLogEntry(level, message, metadata, error);
    this.logEntries.push(entry);

    if (this.config.enableConsole) {
      const logFn = level === LogLevel.ERROR ? console.error : console.log;
      logFn(JSON.stringify(entry));
    }

    if (this.config.enableTelemetry && this.config.telemetryClient) {
      const properties: Record<string, string> = {
        service: this.config.serviceName,
      };

      if (this.correlationId) {
        properties.correlationId = this.correlationId;
      }

      if (entry.metadata) {
        properties.metadata = JSON.stringify(entry.metadata);
      }

      if (error) {
        this.config.telemetryClient.trackException(error, properties);
      } else {
        this.config.telemetryClient.trackTrace(message, logLevelToSeverity(level), properties);
      }
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, metadata, error);
  }

  /**
   * Logs the outcome of an evaluation run
   */
  logEvaluation(entry: EvaluationLogEntry): void {
    this.setCorrelationId(entry.correlationId);

    const metadata: Record<string, unknown> = {
      evaluationId: entry.evaluationId,
      vendorCount: entry.vendorCount,
      criterionCount: entry.criterionCount,
      evidenceCount: entry.evidenceCount,
      scoredVendors: entry.scoredVendors,
      cacheHit: entry.cacheHit,
      processingTimeMs: entry.processingTimeMs,
    };

    if (entry.failedVendors.length > 0) {
      metadata.failedVendors = entry.failedVendors;
    }

    if (entry.disqualifiedVendors.length > 0) {
      metadata.disqualifiedVendors = entry.disqualifiedVendors;
    }

    if (entry.failedVendors.length > 0) {
      this.warn('Evaluation completed with vendor failures', metadata);
    } else {
      this.info('Evaluation completed', metadata);
    }
  }

  flush(): void {
    if (this.config.enableTelemetry && this.config.telemetryClient) {
      this.config.telemetryClient.flush();
    }
  }
}

/**
 * Creates a logger instance with the given configuration
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(config);
}

/**
 * In-memory telemetry client for testing
 */
export class InMemoryTelemetryClient implements TelemetryClient {
  public traces: Array<{ message: string; severity: number; properties?: Record<string, string> }> =
    [];
  public exceptions: Array<{ exception: Error; properties?: Record<string, string> }> = [];
  public metrics: Array<{ name: string; value: number; properties?: Record<string, string> }> = [];
  public flushCount = 0;

  trackTrace(message: string, severity: number, properties?: Record<string, string>): void {
    this.traces.push({ message, severity, properties });
  }

  trackException(exception: Error, properties?: Record<string, string>): void {
    this.exceptions.push({ exception, properties });
  }

  trackMetric(name: string, value: number, properties?: Record<string, string>): void {
    this.metrics.push({ name, value, properties });
  }

  flush(): void {
    this.flushCount++;
  }

  clear(): void {
    this.traces = [];
    this.exceptions = [];
    this.metrics = [];
    this.flushCount = 0;
  }
}

let globalLogger: Logger | null = null;

/**
 * Gets the process-wide logger, reading LOG_LEVEL on first use
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    const level = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
    globalLogger = createLogger(level.success ? { minLevel: level.data } : {});
  }
  return globalLogger;
}

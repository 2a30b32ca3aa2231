/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the pipeline. All logs include a timestamp, level and the relevant context
 * (run_id, athlete_id, clip_id). Implements PII sanitization so athlete
 * names and contact details never reach the logs.
 */

/**
 * Log levels
 */
export enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  run_id?: string;
  athlete_id?: string;
}

/**
 * Pipeline stage log entry
 */
interface PipelineStageLogEntry extends BaseLogEntry {
  log_type: 'PIPELINE_STAGE';
  stage: string;
  outcome: 'started' | 'completed' | 'cancelled' | 'failed';
  duration_ms?: number;
  error_message?: string;
}

/**
 * File operation log entry
 */
interface FileOperationLogEntry extends BaseLogEntry {
  log_type: 'FILE_OPERATION';
  operation: 'copy' | 'delete' | 'export' | 'thumbnail';
  path: string;
  success: boolean;
  error_message?: string;
}

/**
 * Database error log entry
 */
interface DatabaseLogEntry extends BaseLogEntry {
  log_type: 'DATABASE_ERROR';
  error_message: string;
  query_preview: string;
  operation: string;
}

/**
 * PII patterns to sanitize from logs
 */
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

/**
 * Fields that may contain PII and should be excluded
 */
const PII_FIELDS = [
  'name',
  'athlete_name',
  'first_name',
  'last_name',
  'full_name',
  'email',
  'phone',
  'phone_number',
  'device_token',
];

/**
 * Sanitize string by removing PII patterns
 */
function sanitizeString(value: string): string {
  let sanitized = value;

  // Replace email addresses
  sanitized = sanitized.replace(PII_PATTERNS.email, '[EMAIL_REDACTED]');

  // Replace phone numbers
  sanitized = sanitized.replace(PII_PATTERNS.phone, '[PHONE_REDACTED]');

  return sanitized;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Sanitize object by removing PII fields and patterns
 */
export function sanitizeObject(obj: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    // Skip PII fields entirely
    if (PII_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[PII_REDACTED]';
      continue;
    }

    if (isPlainObject(value)) {
      sanitized[key] = sanitizeObject(value);
    } else if (Array.isArray(value)) {
      sanitized[key] = value.map((item: unknown) =>
        isPlainObject(item)
          ? sanitizeObject(item)
          : typeof item === 'string'
          ? sanitizeString(item)
          : item
      );
    } else if (typeof value === 'string') {
      sanitized[key] = sanitizeString(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

/**
 * Write log entry to the console as one JSON line
 */
function writeLog(entry: { level: LogLevel }): void {
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log a pipeline stage transition
 *
 * @example
 * ```typescript
 * logPipelineStage({
 *   runId: 'run-1',
 *   athleteId: 'athlete-1',
 *   stage: 'trim',
 *   outcome: 'failed',
 *   errorMessage: 'ffmpeg exited with code 1'
 * });
 * ```
 */
export function logPipelineStage(params: {
  runId?: string;
  athleteId?: string;
  stage: string;
  outcome: PipelineStageLogEntry['outcome'];
  durationMs?: number;
  errorMessage?: string;
}): void {
  const entry: PipelineStageLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.outcome === 'failed' ? LogLevel.WARN : LogLevel.INFO,
    log_type: 'PIPELINE_STAGE',
    run_id: params.runId,
    athlete_id: params.athleteId,
    stage: params.stage,
    outcome: params.outcome,
    duration_ms: params.durationMs,
    error_message: params.errorMessage ? sanitizeString(params.errorMessage) : undefined,
  };

  writeLog(entry);
}

/**
 * Log a file-system operation on a video or thumbnail
 */
export function logFileOperation(params: {
  operation: FileOperationLogEntry['operation'];
  path: string;
  success: boolean;
  athleteId?: string;
  errorMessage?: string;
}): void {
  const entry: FileOperationLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.WARN,
    log_type: 'FILE_OPERATION',
    athlete_id: params.athleteId,
    operation: params.operation,
    path: params.path,
    success: params.success,
    error_message: params.errorMessage,
  };

  writeLog(entry);
}

/**
 * Log database error
 *
 * Logs database errors with sanitized query preview and error message.
 *
 * @example
 * ```typescript
 * logDatabase({
 *   errorMessage: 'Connection timeout',
 *   query: 'SELECT * FROM video_clips WHERE athlete_id = $1',
 *   operation: 'SELECT'
 * });
 * ```
 */
export function logDatabase(params: {
  athleteId?: string;
  errorMessage: string;
  query: string;
  operation: string;
}): void {
  // Sanitize query to remove potential PII
  const sanitizedQuery = sanitizeString(params.query);

  // Truncate query for logging (first 200 characters)
  const queryPreview = sanitizedQuery.length > 200
    ? sanitizedQuery.substring(0, 200) + '...'
    : sanitizedQuery;

  const entry: DatabaseLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    log_type: 'DATABASE_ERROR',
    athlete_id: params.athleteId,
    error_message: params.errorMessage,
    query_preview: queryPreview,
    operation: params.operation,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * General-purpose logging function for custom log entries.
 * Automatically sanitizes context to remove PII.
 *
 * @example
 * ```typescript
 * log(LogLevel.INFO, 'Default season created', {
 *   athlete_id: 'athlete-123',
 *   season_name: 'Spring 2025'
 * });
 * ```
 */
export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...sanitizedContext,
  };

  writeLog(entry);
}

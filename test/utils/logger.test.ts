/**
 * Tests for Structured Logging Module
 *
 * Validates structured logging functions, PII sanitization,
 * and log format consistency.
 */

import {
  log,
  logDatabase,
  logFileOperation,
  logPipelineStage,
  sanitizeObject,
  LogLevel,
} from '../../src/utils/logger';

describe('Structured Logging Module', () => {
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  describe('logPipelineStage', () => {
    it('should log a completed stage with INFO level', () => {
      logPipelineStage({
        runId: 'run-1',
        athleteId: 'athlete-1',
        stage: 'persist',
        outcome: 'completed',
        durationMs: 120,
      });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);

      expect(logEntry.log_type).toBe('PIPELINE_STAGE');
      expect(logEntry.level).toBe('INFO');
      expect(logEntry.run_id).toBe('run-1');
      expect(logEntry.athlete_id).toBe('athlete-1');
      expect(logEntry.stage).toBe('persist');
      expect(logEntry.outcome).toBe('completed');
      expect(logEntry.duration_ms).toBe(120);
      expect(logEntry.timestamp).toBeDefined();
    });

    it('should log a failed stage with WARN level and a sanitized message', () => {
      logPipelineStage({
        stage: 'trim',
        outcome: 'failed',
        errorMessage: 'Upload for coach@example.com failed',
      });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry.level).toBe('WARN');
      expect(logEntry.error_message).toBe('Upload for [EMAIL_REDACTED] failed');
    });
  });

  describe('logFileOperation', () => {
    it('should log a failed delete with WARN level', () => {
      logFileOperation({
        operation: 'delete',
        path: '/data/documents/a.mov',
        success: false,
        errorMessage: 'EACCES',
      });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry.log_type).toBe('FILE_OPERATION');
      expect(logEntry.level).toBe('WARN');
      expect(logEntry.operation).toBe('delete');
      expect(logEntry.path).toBe('/data/documents/a.mov');
      expect(logEntry.success).toBe(false);
      expect(logEntry.error_message).toBe('EACCES');
    });
  });

  describe('logDatabase', () => {
    it('should log database errors to console.error', () => {
      logDatabase({
        errorMessage: 'Connection timeout',
        query: 'SELECT * FROM video_clips WHERE athlete_id = $1',
        operation: 'SELECT',
      });

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).not.toHaveBeenCalled();

      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);
      expect(logEntry.log_type).toBe('DATABASE_ERROR');
      expect(logEntry.level).toBe('ERROR');
      expect(logEntry.query_preview).toBe('SELECT * FROM video_clips WHERE athlete_id = $1');
    });

    it('should truncate long queries to 200 characters', () => {
      logDatabase({
        errorMessage: 'Syntax error',
        query: 'x'.repeat(250),
        operation: 'SELECT',
      });

      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);
      expect(logEntry.query_preview).toBe('x'.repeat(200) + '...');
    });

    it('should redact phone numbers from queries', () => {
      logDatabase({
        errorMessage: 'Constraint violation',
        query: "UPDATE athletes SET contact = '555-123-4567'",
        operation: 'UPDATE',
      });

      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);
      expect(logEntry.query_preview).toBe("UPDATE athletes SET contact = '[PHONE_REDACTED]'");
    });
  });

  describe('log', () => {
    it('should merge sanitized context into the entry', () => {
      log(LogLevel.INFO, 'Athlete created', { athlete_id: 'athlete-1', name: 'Sam Rivera' });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry.message).toBe('Athlete created');
      expect(logEntry.level).toBe('INFO');
      expect(logEntry.athlete_id).toBe('athlete-1');
      expect(logEntry.name).toBe('[PII_REDACTED]');
    });

    it('should send ERROR entries to console.error', () => {
      log(LogLevel.ERROR, 'Clip event listener failed');

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('sanitizeObject', () => {
    it('should redact nested PII fields and patterns inside arrays', () => {
      expect(
        sanitizeObject({
          athlete: { first_name: 'Sam', position: 'SS' },
          contacts: ['coach@example.com', 7],
          created_at: 'today',
        })
      ).toEqual({
        athlete: { first_name: '[PII_REDACTED]', position: 'SS' },
        contacts: ['[EMAIL_REDACTED]', 7],
        created_at: 'today',
      });
    });
  });
});

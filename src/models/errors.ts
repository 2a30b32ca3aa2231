/**
 * Application Error Models
 *
 * Error types shared by the capture-to-persistence pipeline. Every failure
 * returns control to the caller that started the action; none of them is
 * fatal to the process. `describeError` maps them to the category and
 * remediation the presentation layer shows.
 */

import { Capability, PermissionStatus } from './permission';

/**
 * Resource not found error
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Bad request error (malformed input, invalid state transition)
 */
export class BadRequestError extends Error {
  constructor(message: string, public code?: string, public details?: unknown) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Camera, microphone or notification access was refused
 */
export class PermissionDeniedError extends Error {
  constructor(
    message: string,
    public capability: Capability,
    public status: Exclude<PermissionStatus, 'authorized' | 'not-determined'>
  ) {
    super(message);
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Capture hardware or the picked media type is not usable
 */
export class CapabilityUnavailableError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'CapabilityUnavailableError';
  }
}

/**
 * Reasons a video fails validation
 */
export type VideoValidationReason =
  | 'file-not-found'
  | 'file-too-large'
  | 'duration-too-long'
  | 'unreadable';

/**
 * Video failed the existence, size or duration checks
 */
export class VideoValidationError extends Error {
  constructor(
    message: string,
    public reason: VideoValidationReason,
    public details?: { sizeBytes?: number; durationSeconds?: number; path?: string }
  ) {
    super(message);
    this.name = 'VideoValidationError';
  }
}

/**
 * Trim/export session ended without an output file
 */
export class ExportError extends Error {
  constructor(message: string, public reason: 'failed' | 'cancelled', public cause?: unknown) {
    super(message);
    this.name = 'ExportError';
  }
}

/**
 * Clip save failed; the transaction was rolled back
 */
export class PersistenceError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'PersistenceError';
  }
}

/**
 * Cooperative cancellation observed at a checkpoint
 */
export class OperationCancelledError extends Error {
  constructor(public stage: string) {
    super(`Operation cancelled during ${stage}`);
    this.name = 'OperationCancelledError';
  }
}

export type ErrorCategory =
  | 'permission-denied'
  | 'capability-unavailable'
  | 'validation-failure'
  | 'export-failure'
  | 'storage-low'
  | 'persistence-failure'
  | 'cancelled'
  | 'not-found'
  | 'bad-request'
  | 'unknown';

export type Remediation = 'open-settings' | 'retry' | 'continue-anyway' | 'none';

/**
 * User-facing description of a pipeline error
 */
export interface ErrorDescription {
  category: ErrorCategory;
  message: string;
  remediation: Remediation;
}

/**
 * Map an error to its category, message and remediation action
 */
export function describeError(error: unknown): ErrorDescription {
  if (error instanceof PermissionDeniedError) {
    return { category: 'permission-denied', message: error.message, remediation: 'open-settings' };
  }
  if (error instanceof CapabilityUnavailableError) {
    return { category: 'capability-unavailable', message: error.message, remediation: 'retry' };
  }
  if (error instanceof VideoValidationError) {
    return { category: 'validation-failure', message: error.message, remediation: 'retry' };
  }
  if (error instanceof ExportError) {
    return { category: 'export-failure', message: error.message, remediation: 'retry' };
  }
  if (error instanceof PersistenceError) {
    return { category: 'persistence-failure', message: error.message, remediation: 'retry' };
  }
  if (error instanceof OperationCancelledError) {
    return { category: 'cancelled', message: error.message, remediation: 'none' };
  }
  if (error instanceof NotFoundError) {
    return { category: 'not-found', message: error.message, remediation: 'none' };
  }
  if (error instanceof BadRequestError) {
    return { category: 'bad-request', message: error.message, remediation: 'none' };
  }

  return {
    category: 'unknown',
    message: error instanceof Error ? error.message : 'Unknown error',
    remediation: 'retry',
  };
}

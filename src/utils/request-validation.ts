/**
 * Request Validation Module
 *
 * Validates clip save requests and recording settings against JSON schemas
 * using ajv. Throws BadRequestError with field-specific errors for invalid
 * input.
 */

import Ajv, { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import { PLAY_RESULT_TYPES, MAX_PITCH_SPEED_MPH } from '../models/play-result';
import { SaveClipRequest } from '../models/video-clip';
import { MAX_VIDEO_DURATION_SECONDS, QUALITY_PRESETS, RecordingSettings } from '../models/recording';
import { BadRequestError } from '../models/errors';

// Initialize ajv with strict mode and format validators
const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
});

// Add format validators (uuid, etc.)
addFormats(ajv);

const saveClipRequestSchema = {
  type: 'object',
  properties: {
    sourcePath: { type: 'string', minLength: 1 },
    athleteId: { type: 'string', format: 'uuid' },
    gameId: { type: 'string', format: 'uuid' },
    practiceId: { type: 'string', format: 'uuid' },
    playResult: { type: 'string', enum: [...PLAY_RESULT_TYPES] },
    pitchSpeed: { type: 'number', exclusiveMinimum: 0, maximum: MAX_PITCH_SPEED_MPH },
    durationSeconds: { type: 'number', minimum: 0, maximum: MAX_VIDEO_DURATION_SECONDS },
  },
  required: ['sourcePath', 'athleteId'],
  additionalProperties: false,
};

const recordingSettingsProperties = {
  quality: { type: 'string', enum: Object.keys(QUALITY_PRESETS) },
  maxDurationSeconds: { type: 'integer', minimum: 1, maximum: MAX_VIDEO_DURATION_SECONDS },
  format: { type: 'string', enum: ['hevc', 'h264'] },
  frameRate: { type: 'integer', enum: [24, 30, 60, 120, 240] },
};

const recordingSettingsSchema = {
  type: 'object',
  properties: recordingSettingsProperties,
  required: ['quality', 'maxDurationSeconds', 'format', 'frameRate'],
  additionalProperties: false,
};

const recordingSettingsPatchSchema = {
  type: 'object',
  properties: recordingSettingsProperties,
  additionalProperties: false,
};

const saveClipRequestValidator = ajv.compile<SaveClipRequest>(saveClipRequestSchema);
const recordingSettingsValidator = ajv.compile<RecordingSettings>(recordingSettingsSchema);
const recordingSettingsPatchValidator = ajv.compile<Partial<RecordingSettings>>(recordingSettingsPatchSchema);

/**
 * Format ajv validation errors into field-specific error details
 */
export function formatValidationErrors(errors: ErrorObject[]): Record<string, string> {
  const details: Record<string, string> = {};

  for (const error of errors) {
    const field = error.instancePath
      ? error.instancePath.substring(1)
      : String(error.params.missingProperty || error.params.additionalProperty || 'payload');

    let message = error.message || 'Validation failed';

    // Enhance error messages based on error type
    if (error.keyword === 'required') {
      message = `Missing required field: ${error.params.missingProperty}`;
    } else if (error.keyword === 'type') {
      message = `Expected ${error.params.type}, received ${typeof error.data}`;
    } else if (error.keyword === 'format') {
      message = `Invalid format, expected ${error.params.format}`;
    } else if (error.keyword === 'enum') {
      message = 'Must be one of the allowed values';
    } else if (error.keyword === 'minimum' || error.keyword === 'exclusiveMinimum') {
      message = `Must be ${error.params.comparison} ${error.params.limit}`;
    } else if (error.keyword === 'maximum') {
      message = `Must be <= ${error.params.limit}`;
    } else if (error.keyword === 'minLength') {
      message = `Must be at least ${error.params.limit} characters`;
    } else if (error.keyword === 'additionalProperties') {
      message = `Unknown field: ${error.params.additionalProperty}`;
    }

    details[field] = message;
  }

  return details;
}

/**
 * Validate a clip save request
 *
 * @throws BadRequestError (code INVALID_CLIP_REQUEST) with field-specific details
 */
export function validateSaveClipRequest(request: unknown): SaveClipRequest {
  if (!saveClipRequestValidator(request)) {
    throw new BadRequestError(
      'Invalid clip request',
      'INVALID_CLIP_REQUEST',
      formatValidationErrors(saveClipRequestValidator.errors ?? [])
    );
  }

  if (request.gameId && request.practiceId) {
    throw new BadRequestError(
      'A clip can belong to a game or a practice, not both',
      'INVALID_CLIP_REQUEST',
      { practiceId: 'Cannot be combined with gameId' }
    );
  }

  return request;
}

/**
 * Validate a complete recording settings document
 *
 * @throws BadRequestError (code INVALID_RECORDING_SETTINGS)
 */
export function validateRecordingSettings(settings: unknown): RecordingSettings {
  if (!recordingSettingsValidator(settings)) {
    throw new BadRequestError(
      'Invalid recording settings',
      'INVALID_RECORDING_SETTINGS',
      formatValidationErrors(recordingSettingsValidator.errors ?? [])
    );
  }
  return settings;
}

/**
 * Validate a partial recording settings update
 *
 * @throws BadRequestError (code INVALID_RECORDING_SETTINGS)
 */
export function validateRecordingSettingsPatch(patch: unknown): Partial<RecordingSettings> {
  if (!recordingSettingsPatchValidator(patch)) {
    throw new BadRequestError(
      'Invalid recording settings',
      'INVALID_RECORDING_SETTINGS',
      formatValidationErrors(recordingSettingsPatchValidator.errors ?? [])
    );
  }
  return patch;
}

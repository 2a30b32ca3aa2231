/**
 * Storage Models
 *
 * Free-space readings for the documents volume.
 */

/** Below this, capture asks the user before continuing */
export const LOW_STORAGE_THRESHOLD_BYTES = 500_000_000;

/** Below this, storage is reported as critical */
export const CRITICAL_STORAGE_THRESHOLD_BYTES = 100_000_000;

/** Rough size of one minute of recorded video */
export const BYTES_PER_MINUTE_OF_VIDEO = 150_000_000;

export type StorageLevel = 'good' | 'moderate' | 'low' | 'critical';

export interface StorageStatus {
  availableBytes: number;
  totalBytes: number;
  level: StorageLevel;
  isLow: boolean;
  isCritical: boolean;
  estimatedMinutesOfVideo: number;
}

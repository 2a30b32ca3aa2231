/**
 * Storage Monitor
 *
 * Reads free space on the documents volume. Low storage is advisory: the
 * pipeline asks the user whether to continue, it never blocks by itself.
 * The monitor only reads and publishes; it never changes pipeline state.
 */

import { promises as fs } from 'fs';
import {
  BYTES_PER_MINUTE_OF_VIDEO,
  CRITICAL_STORAGE_THRESHOLD_BYTES,
  LOW_STORAGE_THRESHOLD_BYTES,
  StorageLevel,
  StorageStatus,
} from '../models/storage';
import { ClipEventBus } from './clip-event-bus';
import { log, LogLevel } from '../utils/logger';
import { errorMessage } from '../utils/fs-errors';

/**
 * Volume reading in the shape fs.statfs reports it
 */
export interface VolumeStats {
  bavail: number;
  bsize: number;
  blocks: number;
}

export type StatfsReader = (directory: string) => Promise<VolumeStats>;

/**
 * Classify a free-space reading
 */
export function classifyStorage(availableBytes: number, totalBytes: number): StorageStatus {
  const isCritical = availableBytes < CRITICAL_STORAGE_THRESHOLD_BYTES;
  const isLow = availableBytes < LOW_STORAGE_THRESHOLD_BYTES;
  const fractionAvailable = totalBytes > 0 ? availableBytes / totalBytes : 0;

  let level: StorageLevel;
  if (isCritical) {
    level = 'critical';
  } else if (isLow) {
    level = 'low';
  } else if (fractionAvailable > 0.5) {
    level = 'good';
  } else if (fractionAvailable > 0.2) {
    level = 'moderate';
  } else {
    level = 'low';
  }

  return {
    availableBytes,
    totalBytes,
    level,
    isLow,
    isCritical,
    estimatedMinutesOfVideo: Math.floor(availableBytes / BYTES_PER_MINUTE_OF_VIDEO),
  };
}

export class StorageMonitor {
  private readStats: StatfsReader;
  private events?: ClipEventBus;

  constructor(
    private directory: string,
    options: { statfs?: StatfsReader; events?: ClipEventBus } = {}
  ) {
    this.readStats = options.statfs ?? ((dir) => fs.statfs(dir));
    this.events = options.events;
  }

  async check(): Promise<StorageStatus> {
    const stats = await this.readStats(this.directory);
    const status = classifyStorage(stats.bavail * stats.bsize, stats.blocks * stats.bsize);

    if (status.isLow) {
      log(LogLevel.WARN, 'Device storage is low', {
        available_bytes: status.availableBytes,
        storage_level: status.level,
      });
    }

    this.events?.emit('storage-status', status);
    return status;
  }

  /**
   * Poll free space until the returned stop function is called
   */
  watch(intervalMs: number, listener: (status: StorageStatus) => void): () => void {
    const poll = () => {
      this.check()
        .then(listener)
        .catch((error: unknown) => {
          log(LogLevel.WARN, 'Storage check failed', { error: errorMessage(error) });
        });
    };

    poll();
    const timer = setInterval(poll, intervalMs);
    timer.unref();

    return () => clearInterval(timer);
  }
}

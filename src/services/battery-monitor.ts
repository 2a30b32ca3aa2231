/**
 * Battery Monitor
 *
 * Reads the battery from the host and publishes it. A low battery is
 * advisory, like low storage: the host decides whether to record anyway.
 */

import {
  BatteryProvider,
  BatteryReading,
  BatteryStatus,
  CRITICAL_BATTERY_LEVEL,
  LOW_BATTERY_LEVEL,
} from '../models/device';
import { RecordingQuality } from '../models/recording';
import { ClipEventBus } from './clip-event-bus';
import { log, LogLevel } from '../utils/logger';
import { errorMessage } from '../utils/fs-errors';

/**
 * Classify a battery reading
 *
 * A charging or full battery is never low. The 4K hint applies only below
 * the critical level.
 */
export function classifyBattery(reading: BatteryReading, quality?: RecordingQuality): BatteryStatus {
  const level = Math.min(1, Math.max(0, reading.level));
  const onBattery = reading.state !== 'charging' && reading.state !== 'full';
  const isLow = onBattery && level < LOW_BATTERY_LEVEL;
  const isCritical = onBattery && level < CRITICAL_BATTERY_LEVEL;

  const status: BatteryStatus = { level, state: reading.state, isLow, isCritical };
  if (isLow) {
    status.warning =
      isCritical && quality === '4K'
        ? 'Your battery is low. Consider using 1080p instead of 4K to conserve power.'
        : `Your battery is at ${Math.round(level * 100)}%. Recording may drain it quickly.`;
  }
  return status;
}

export class BatteryMonitor {
  private events?: ClipEventBus;
  private quality?: () => RecordingQuality;

  constructor(
    private provider: BatteryProvider,
    options: { events?: ClipEventBus; quality?: () => RecordingQuality } = {}
  ) {
    this.events = options.events;
    this.quality = options.quality;
  }

  async check(): Promise<BatteryStatus> {
    const status = classifyBattery(await this.provider.current(), this.quality?.());

    if (status.isLow) {
      log(LogLevel.WARN, 'Battery is low', { battery_level: status.level, state: status.state });
    }

    this.events?.emit('battery-status', status);
    return status;
  }

  /**
   * Poll the battery until the returned stop function is called
   */
  watch(intervalMs: number, listener: (status: BatteryStatus) => void): () => void {
    const poll = () => {
      this.check()
        .then(listener)
        .catch((error: unknown) => {
          log(LogLevel.WARN, 'Battery check failed', { error: errorMessage(error) });
        });
    };

    poll();
    const timer = setInterval(poll, intervalMs);
    timer.unref();

    return () => clearInterval(timer);
  }
}

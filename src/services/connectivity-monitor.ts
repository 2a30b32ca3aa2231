/**
 * Connectivity Monitor
 *
 * Reads the network path from the host and publishes it. Uploads and
 * sharing may consult the status; capture and saving never do.
 */

import { ConnectionType, ConnectivityProvider, ConnectivityReading, ConnectivityStatus } from '../models/device';
import { ClipEventBus } from './clip-event-bus';
import { log, LogLevel } from '../utils/logger';
import { errorMessage } from '../utils/fs-errors';

const CONNECTION_NAMES: Record<ConnectionType, string> = {
  wifi: 'WiFi',
  cellular: 'Cellular',
  wired: 'Ethernet',
  unknown: 'Unknown',
};

export function describeConnectivity(reading: ConnectivityReading): ConnectivityStatus {
  let message: string;
  if (!reading.isConnected) {
    message = 'No internet connection';
  } else if (reading.connectionType === 'cellular') {
    message = reading.isExpensive ? 'Connected via cellular (limited data)' : 'Connected via cellular';
  } else {
    message = `Connected via ${CONNECTION_NAMES[reading.connectionType]}`;
  }
  return { ...reading, message };
}

/**
 * Whether a background upload may start on this connection
 *
 * Cellular needs explicit consent; an unknown interface is treated as
 * unmetered.
 */
export function allowsUploads(status: ConnectivityReading, allowCellular = false): boolean {
  if (!status.isConnected) {
    return false;
  }
  return status.connectionType !== 'cellular' || allowCellular;
}

export class ConnectivityMonitor {
  private events?: ClipEventBus;
  private last?: ConnectivityStatus;

  constructor(
    private provider: ConnectivityProvider,
    options: { events?: ClipEventBus } = {}
  ) {
    this.events = options.events;
  }

  /** Most recent reading, if any */
  get status(): ConnectivityStatus | undefined {
    return this.last;
  }

  async check(): Promise<ConnectivityStatus> {
    const status = describeConnectivity(await this.provider.current());

    if (
      !this.last ||
      this.last.isConnected !== status.isConnected ||
      this.last.connectionType !== status.connectionType
    ) {
      log(LogLevel.INFO, 'Connectivity changed', {
        connected: status.isConnected,
        connection_type: status.connectionType,
        expensive: status.isExpensive,
      });
    }

    this.last = status;
    this.events?.emit('connectivity-status', status);
    return status;
  }

  /**
   * Poll the network path until the returned stop function is called
   */
  watch(intervalMs: number, listener: (status: ConnectivityStatus) => void): () => void {
    const poll = () => {
      this.check()
        .then(listener)
        .catch((error: unknown) => {
          log(LogLevel.WARN, 'Connectivity check failed', { error: errorMessage(error) });
        });
    };

    poll();
    const timer = setInterval(poll, intervalMs);
    timer.unref();

    return () => clearInterval(timer);
  }
}

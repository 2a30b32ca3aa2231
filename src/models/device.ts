/**
 * Device Models
 *
 * Network and battery readings supplied by the host application. The
 * observers publish them; nothing in the pipeline blocks on them.
 */

export type ConnectionType = 'wifi' | 'cellular' | 'wired' | 'unknown';

/**
 * Network path as the host reports it
 */
export interface ConnectivityReading {
  isConnected: boolean;
  connectionType: ConnectionType;
  /** Metered or data-limited connection */
  isExpensive: boolean;
}

export interface ConnectivityStatus extends ConnectivityReading {
  message: string;
}

export interface ConnectivityProvider {
  current(): Promise<ConnectivityReading>;
}

/** Below this level, unless charging, recording warns before starting */
export const LOW_BATTERY_LEVEL = 0.2;

/** Below this level a 4K recording is discouraged */
export const CRITICAL_BATTERY_LEVEL = 0.1;

export type BatteryState = 'unplugged' | 'charging' | 'full' | 'unknown';

export interface BatteryReading {
  /** 0 to 1 */
  level: number;
  state: BatteryState;
}

export interface BatteryStatus extends BatteryReading {
  isLow: boolean;
  isCritical: boolean;
  /** Set when isLow */
  warning?: string;
}

export interface BatteryProvider {
  current(): Promise<BatteryReading>;
}

/**
 * Permission Service
 *
 * Gate in front of capture and notifications. Queries the OS status for each
 * requested capability and shows the OS prompt when it has not been decided
 * yet. There is no retry; the status is re-queried on the next call.
 */

import { Capability, PermissionProvider, PermissionResult } from '../models/permission';
import { PermissionDeniedError } from '../models/errors';
import { log, LogLevel } from '../utils/logger';

const DENIED_MESSAGES: Record<Capability, string> = {
  camera: 'Camera access is required to record videos. Please enable camera access in Settings.',
  microphone:
    'Microphone access is required to record videos with audio. Please enable microphone access in Settings.',
  notifications:
    'Notifications are turned off. Please enable notifications in Settings to get completion alerts.',
};

const RESTRICTED_MESSAGES: Record<Capability, string> = {
  camera: 'Camera access is restricted. Please check your device settings.',
  microphone: 'Microphone access is restricted. Please check your device settings.',
  notifications: 'Notifications are restricted. Please check your device settings.',
};

/**
 * Permission Service
 * Resolves capability permissions, prompting when undetermined
 */
export class PermissionService {
  constructor(private provider: PermissionProvider) {}

  /**
   * Ensure every capability is authorized, checked in order
   *
   * @returns The first non-authorized result, or authorized
   */
  async ensure(capabilities: Capability[]): Promise<PermissionResult> {
    for (const capability of capabilities) {
      const result = await this.ensureOne(capability);
      if (result.status !== 'authorized') {
        log(LogLevel.INFO, 'Permission not granted', {
          capability,
          status: result.status,
        });
        return result;
      }
    }
    return { status: 'authorized' };
  }

  async isAuthorized(capability: Capability): Promise<boolean> {
    return (await this.provider.status(capability)) === 'authorized';
  }

  /**
   * Convert a non-authorized result into an error
   */
  toError(result: Exclude<PermissionResult, { status: 'authorized' }>): PermissionDeniedError {
    return new PermissionDeniedError(result.message, result.capability, result.status);
  }

  private async ensureOne(capability: Capability): Promise<PermissionResult> {
    const status = await this.provider.status(capability);

    switch (status) {
      case 'authorized':
        return { status: 'authorized' };
      case 'denied':
        return { status: 'denied', capability, message: DENIED_MESSAGES[capability] };
      case 'restricted':
        return { status: 'restricted', capability, message: RESTRICTED_MESSAGES[capability] };
      case 'not-determined': {
        const granted = await this.provider.request(capability);
        return granted
          ? { status: 'authorized' }
          : { status: 'denied', capability, message: DENIED_MESSAGES[capability] };
      }
    }
  }
}

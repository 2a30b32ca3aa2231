/**
 * Notification Service
 *
 * Single "notify on completion" capability over an injected sender. Delivery
 * is gated on the notifications permission and never fails the caller.
 */

import { PermissionService } from './permission-service';
import { log, LogLevel } from '../utils/logger';
import { errorMessage } from '../utils/fs-errors';

/**
 * Local notification delivery, injected by the host application
 */
export interface NotificationSender {
  send(notification: { title: string; body: string }): Promise<void>;
}

export class NotificationService {
  constructor(private sender: NotificationSender, private permissions: PermissionService) {}

  /**
   * Show a completion notification when notifications are authorized
   *
   * @returns true when the notification was handed to the sender
   */
  async notifyCompletion(title: string, body: string): Promise<boolean> {
    try {
      if (!(await this.permissions.isAuthorized('notifications'))) {
        return false;
      }
      await this.sender.send({ title, body });
      return true;
    } catch (error) {
      log(LogLevel.WARN, 'Completion notification failed', { error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Register a push device token with the server
   *
   * There is no remote endpoint; registration always reports success.
   */
  async registerDeviceToken(token: string): Promise<boolean> {
    log(LogLevel.INFO, 'Device token registration skipped', { token_length: token.length });
    return true;
  }
}

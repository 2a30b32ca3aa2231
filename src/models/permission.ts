/**
 * Permission Models
 *
 * Capabilities the pipeline asks the operating system for, and the statuses
 * the OS reports back.
 */

export type Capability = 'camera' | 'microphone' | 'notifications';

export type PermissionStatus = 'authorized' | 'denied' | 'restricted' | 'not-determined';

/**
 * OS-side permission capability, injected by the host application
 */
export interface PermissionProvider {
  status(capability: Capability): Promise<PermissionStatus>;
  /** Shows the OS prompt; resolves true when the user grants access */
  request(capability: Capability): Promise<boolean>;
}

/**
 * Outcome of a permission gate check
 */
export type PermissionResult =
  | { status: 'authorized' }
  | {
      status: 'denied' | 'restricted';
      capability: Capability;
      message: string;
    };

/**
 * Clip Event Models
 *
 * Payloads published on the clip event bus so other consumers can refresh
 * lists and counters.
 */

import { PlayResultType } from './play-result';
import { Statistics } from './statistics';
import { BatteryStatus, ConnectivityStatus } from './device';
import { StorageStatus } from './storage';
import { VideoClip } from './video-clip';

export interface ClipEventMap {
  'clip-saved': { clip: VideoClip };
  'clip-deleted': { clipId: string; athleteId: string };
  'statistics-updated': {
    athleteId: string;
    gameId?: string;
    seasonId?: string;
    playResult: PlayResultType;
    statistics: Statistics;
  };
  'thumbnail-attached': { clipId: string; thumbnailPath: string };
  'storage-status': StorageStatus;
  'connectivity-status': ConnectivityStatus;
  'battery-status': BatteryStatus;
}

export type ClipEventName = keyof ClipEventMap;

export type ClipEventListener<E extends ClipEventName> = (
  payload: ClipEventMap[E]
) => void | Promise<void>;

/**
 * Capture Sources
 *
 * Two interchangeable providers of a local video file: the camera and the
 * media library. Both report every failure through a thrown error and never
 * retry; the caller starts over.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  CameraDevice,
  CapturedVideo,
  CaptureSource,
  MediaPicker,
  SUPPORTED_VIDEO_EXTENSIONS,
} from '../models/recording';
import { CapabilityUnavailableError, OperationCancelledError } from '../models/errors';
import { RecordingSettingsStore } from './recording-settings-store';
import { VideoFileStore } from './video-file-store';
import { checkpoint, isCancellation } from '../utils/cancellation';

/**
 * Live camera capture bounded by the configured duration and quality
 */
export class CameraCaptureSource implements CaptureSource {
  readonly origin = 'camera' as const;

  constructor(
    private camera: CameraDevice,
    private settings: RecordingSettingsStore,
    private files: VideoFileStore
  ) {}

  async acquire(signal: AbortSignal): Promise<CapturedVideo> {
    checkpoint(signal, 'capture');

    if (!(await this.camera.isAvailable())) {
      throw new CapabilityUnavailableError('Camera is not available on this device.');
    }

    const settings = this.settings.get();
    const outputPath = this.files.tempPath('.mov');
    await this.files.ensureDirectories();

    let recordedPath: string;
    try {
      recordedPath = await this.camera.record(
        {
          outputPath,
          maxDurationSeconds: settings.maxDurationSeconds,
          quality: settings.quality,
          format: settings.format,
          frameRate: settings.frameRate,
        },
        signal
      );
    } catch (error) {
      await this.files.cleanup([outputPath]);
      if (signal.aborted || isCancellation(error)) {
        throw new OperationCancelledError('capture');
      }
      throw new CapabilityUnavailableError('Recording failed. Please try again.', error);
    }

    if (signal.aborted) {
      await this.files.cleanup([outputPath, recordedPath]);
      throw new OperationCancelledError('capture');
    }

    return {
      path: recordedPath,
      origin: this.origin,
      isTemporary: this.files.isTemporary(recordedPath),
    };
  }
}

/**
 * Media-library import constrained to video items
 *
 * The picked file is copied into the temp directory so later cleanup never
 * touches the user's library.
 */
export class LibraryImportSource implements CaptureSource {
  readonly origin = 'library' as const;

  constructor(private picker: MediaPicker, private files: VideoFileStore) {}

  async acquire(signal: AbortSignal): Promise<CapturedVideo> {
    checkpoint(signal, 'import');

    const picked = await this.picker.pickVideo(signal);
    if (!picked || signal.aborted) {
      throw new OperationCancelledError('import');
    }

    const extension = path.extname(picked.path).toLowerCase();
    const isVideoMime = picked.mimeType === undefined || picked.mimeType.startsWith('video/');
    if (!SUPPORTED_VIDEO_EXTENSIONS.includes(extension) || !isVideoMime) {
      throw new CapabilityUnavailableError(
        'This file type is not supported. Please choose a MOV, MP4 or M4V video.'
      );
    }

    const tempPath = this.files.tempPath(extension);
    await this.files.ensureDirectories();
    try {
      await fs.copyFile(picked.path, tempPath);
    } catch (error) {
      await this.files.cleanup([tempPath]);
      throw new CapabilityUnavailableError('The selected video could not be loaded.', error);
    }

    if (signal.aborted) {
      await this.files.cleanup([tempPath]);
      throw new OperationCancelledError('import');
    }

    return { path: tempPath, origin: this.origin, isTemporary: true };
  }
}

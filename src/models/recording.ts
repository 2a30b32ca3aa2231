/**
 * Recording Models
 *
 * Recording settings, quality presets and the capture/import contracts the
 * host application implements for camera hardware and the media library.
 */

export type RecordingQuality = '480p' | '720p' | '1080p' | '4K';
export type VideoFormat = 'hevc' | 'h264';
export type FrameRate = 24 | 30 | 60 | 120 | 240;

/**
 * Quality preset details
 */
export interface QualityPreset {
  label: string;
  width: number;
  height: number;
  approxMbPerMinute: number;
}

export const QUALITY_PRESETS: Record<RecordingQuality, QualityPreset> = {
  '480p': { label: 'SD (480p)', width: 854, height: 480, approxMbPerMinute: 8 },
  '720p': { label: 'HD (720p)', width: 1280, height: 720, approxMbPerMinute: 25 },
  '1080p': { label: 'Full HD (1080p)', width: 1920, height: 1080, approxMbPerMinute: 60 },
  '4K': { label: '4K Ultra HD', width: 3840, height: 2160, approxMbPerMinute: 200 },
};

/**
 * Longest recording or import accepted, in seconds
 */
export const MAX_VIDEO_DURATION_SECONDS = 600;

/**
 * Largest video file accepted, in bytes (500 MiB)
 */
export const MAX_VIDEO_SIZE_BYTES = 500 * 1024 * 1024;

export const SUPPORTED_VIDEO_EXTENSIONS: readonly string[] = ['.mov', '.mp4', '.m4v'];

/**
 * User recording preferences
 */
export interface RecordingSettings {
  quality: RecordingQuality;
  maxDurationSeconds: number;
  format: VideoFormat;
  frameRate: FrameRate;
}

export const DEFAULT_RECORDING_SETTINGS: RecordingSettings = {
  quality: '1080p',
  maxDurationSeconds: MAX_VIDEO_DURATION_SECONDS,
  format: 'hevc',
  frameRate: 30,
};

/**
 * Where a captured video came from
 */
export type CaptureOrigin = 'camera' | 'library';

/**
 * Local file produced by a capture source
 */
export interface CapturedVideo {
  path: string;
  origin: CaptureOrigin;
  /** True when the file lives in the temp directory and must be cleaned up */
  isTemporary: boolean;
}

/**
 * Options passed to the camera for one recording
 */
export interface CameraRecordOptions {
  outputPath: string;
  maxDurationSeconds: number;
  quality: RecordingQuality;
  format: VideoFormat;
  frameRate: FrameRate;
}

/**
 * Camera hardware, injected by the host application
 */
export interface CameraDevice {
  isAvailable(): Promise<boolean>;
  /** Resolves with the written file path once recording stops */
  record(options: CameraRecordOptions, signal: AbortSignal): Promise<string>;
}

/**
 * Item returned by the media-library picker
 */
export interface PickedMedia {
  path: string;
  mimeType?: string;
}

/**
 * Media-library picker, injected by the host application
 */
export interface MediaPicker {
  /** Resolves null when the user closes the picker without choosing */
  pickVideo(signal: AbortSignal): Promise<PickedMedia | null>;
}

/**
 * Provider yielding a local video file
 */
export interface CaptureSource {
  readonly origin: CaptureOrigin;
  acquire(signal: AbortSignal): Promise<CapturedVideo>;
}

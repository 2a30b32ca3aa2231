/**
 * Media Models
 *
 * Contracts for probing, trimming and frame extraction.
 */

/**
 * Sub-range of a video, in seconds
 */
export interface TimeRange {
  startSeconds: number;
  endSeconds: number;
}

export interface FrameOptions {
  atSeconds: number;
  width: number;
  height: number;
}

/**
 * Reads a video's duration
 */
export interface VideoProbe {
  probeDuration(path: string): Promise<number>;
}

/**
 * Re-encodes and extracts frames from video files
 */
export interface MediaToolkit extends VideoProbe {
  exportRange(
    sourcePath: string,
    outputPath: string,
    range: TimeRange,
    options: { signal: AbortSignal; onProgress?: (fraction: number) => void }
  ): Promise<void>;
  extractFrame(
    videoPath: string,
    outputPath: string,
    options: FrameOptions,
    signal?: AbortSignal
  ): Promise<void>;
}

/**
 * Video that passed validation
 */
export interface ValidatedVideo {
  path: string;
  sizeBytes: number;
  durationSeconds: number;
}

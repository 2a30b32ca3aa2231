/**
 * FFmpeg Toolkit
 *
 * MediaToolkit implementation that shells out to ffprobe and ffmpeg. Each
 * operation is one child process; aborting the signal kills it.
 */

import { spawn } from 'child_process';
import { FrameOptions, MediaToolkit, TimeRange } from '../models/media';
import { OperationCancelledError } from '../models/errors';
import { log, LogLevel } from '../utils/logger';

export interface FfmpegToolkitOptions {
  ffmpegPath: string;
  ffprobePath: string;
}

interface ProcessOutput {
  stdout: string;
  stderr: string;
}

/**
 * Parse the last `time=HH:MM:SS.xx` progress marker in an ffmpeg stderr chunk
 *
 * @returns Seconds, or null when the chunk carries no marker
 */
export function parseFfmpegTime(chunk: string): number | null {
  const matches = [...chunk.matchAll(/time=(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/g)];
  const last = matches[matches.length - 1];
  if (!last) {
    return null;
  }
  return Number(last[1]) * 3600 + Number(last[2]) * 60 + Number(last[3]);
}

function formatSeconds(seconds: number): string {
  return seconds.toFixed(3);
}

/**
 * FFmpeg Toolkit
 * Probes durations, exports time ranges and extracts still frames
 */
export class FfmpegToolkit implements MediaToolkit {
  constructor(private options: FfmpegToolkitOptions) {}

  async probeDuration(videoPath: string): Promise<number> {
    const { stdout } = await this.run(this.options.ffprobePath, [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      videoPath,
    ]);

    const duration = parseFloat(stdout.trim());
    if (!Number.isFinite(duration)) {
      throw new Error(`Could not read duration of ${videoPath}`);
    }
    return duration;
  }

  async exportRange(
    sourcePath: string,
    outputPath: string,
    range: TimeRange,
    options: { signal: AbortSignal; onProgress?: (fraction: number) => void }
  ): Promise<void> {
    const length = range.endSeconds - range.startSeconds;
    const onProgress = options.onProgress;

    await this.run(
      this.options.ffmpegPath,
      [
        '-y',
        '-ss', formatSeconds(range.startSeconds),
        '-i', sourcePath,
        '-t', formatSeconds(length),
        '-c:v', 'libx264',
        '-preset', 'veryfast',
        '-c:a', 'aac',
        '-movflags', '+faststart',
        outputPath,
      ],
      options.signal,
      onProgress
        ? (chunk) => {
            const seconds = parseFfmpegTime(chunk);
            if (seconds !== null && length > 0) {
              onProgress(Math.min(1, seconds / length));
            }
          }
        : undefined
    );

    onProgress?.(1);
  }

  async extractFrame(
    videoPath: string,
    outputPath: string,
    frame: FrameOptions,
    signal?: AbortSignal
  ): Promise<void> {
    await this.run(
      this.options.ffmpegPath,
      [
        '-y',
        '-ss', formatSeconds(frame.atSeconds),
        '-i', videoPath,
        '-frames:v', '1',
        '-vf', `scale=${frame.width}:${frame.height}:force_original_aspect_ratio=decrease`,
        '-q:v', '4',
        outputPath,
      ],
      signal
    );
  }

  private run(
    command: string,
    args: string[],
    signal?: AbortSignal,
    onStderr?: (chunk: string) => void
  ): Promise<ProcessOutput> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new OperationCancelledError(command));
        return;
      }

      const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';
      let cancelled = false;

      const onAbort = () => {
        cancelled = true;
        child.kill('SIGKILL');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        stderr += chunk;
        onStderr?.(chunk);
      });

      child.on('error', (error) => {
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      });

      child.on('close', (code) => {
        signal?.removeEventListener('abort', onAbort);

        if (cancelled) {
          reject(new OperationCancelledError(command));
          return;
        }
        if (code !== 0) {
          const tail = stderr.trim().split('\n').slice(-3).join(' | ');
          log(LogLevel.WARN, 'Media tool exited with an error', {
            command,
            exit_code: code,
            stderr_tail: tail,
          });
          reject(new Error(`${command} exited with code ${code}: ${tail}`));
          return;
        }
        resolve({ stdout, stderr });
      });
    });
  }
}

/**
 * MediaToolkit stand-in that writes small placeholder files instead of
 * running ffmpeg
 */

import { promises as fs } from 'fs';
import { FrameOptions, MediaToolkit, TimeRange } from '../../src/models/media';
import { OperationCancelledError } from '../../src/models/errors';

export type ExportBehavior = 'succeed' | 'fail' | 'hang';

export class FakeMediaToolkit implements MediaToolkit {
  durations = new Map<string, number>();
  defaultDuration = 12;
  exportBehaviors: ExportBehavior[] = [];
  frameFails = false;
  exportCalls: Array<{ sourcePath: string; outputPath: string; range: TimeRange }> = [];
  frameCalls: Array<{ videoPath: string; outputPath: string; options: FrameOptions }> = [];
  /** Resolves once an export has started writing its output */
  exportStarted: Promise<void>;
  private markExportStarted: () => void = () => undefined;

  constructor() {
    this.exportStarted = this.resetExportStarted();
  }

  async probeDuration(path: string): Promise<number> {
    const duration = this.durations.get(path);
    if (duration === undefined && this.defaultDuration < 0) {
      throw new Error('unreadable');
    }
    return duration ?? this.defaultDuration;
  }

  async exportRange(
    sourcePath: string,
    outputPath: string,
    range: TimeRange,
    options: { signal: AbortSignal; onProgress?: (fraction: number) => void }
  ): Promise<void> {
    this.exportCalls.push({ sourcePath, outputPath, range });
    const behavior = this.exportBehaviors.shift() ?? 'succeed';

    await fs.writeFile(outputPath, 'partial');
    this.markExportStarted();
    options.onProgress?.(0.5);

    if (behavior === 'fail') {
      throw new Error('encoder error');
    }

    if (behavior === 'hang') {
      await new Promise<void>((_resolve, reject) => {
        const onAbort = () => reject(new OperationCancelledError('export'));
        if (options.signal.aborted) {
          onAbort();
        } else {
          options.signal.addEventListener('abort', onAbort, { once: true });
        }
      });
    }

    await fs.writeFile(outputPath, 'trimmed video');
    this.durations.set(outputPath, range.endSeconds - range.startSeconds);
    options.onProgress?.(1);
  }

  async extractFrame(videoPath: string, outputPath: string, options: FrameOptions): Promise<void> {
    this.frameCalls.push({ videoPath, outputPath, options });
    if (this.frameFails) {
      throw new Error('no video stream');
    }
    await fs.writeFile(outputPath, 'jpeg');
  }

  resetExportStarted(): Promise<void> {
    this.exportStarted = new Promise<void>((resolve) => {
      this.markExportStarted = resolve;
    });
    return this.exportStarted;
  }
}

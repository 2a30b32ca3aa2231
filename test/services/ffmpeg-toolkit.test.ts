/**
 * FFmpeg Toolkit Tests
 *
 * child_process is mocked; no media tool runs.
 */

import { EventEmitter } from 'events';
import { spawn } from 'child_process';
import { FfmpegToolkit, parseFfmpegTime } from '../../src/services/ffmpeg-toolkit';
import { OperationCancelledError } from '../../src/models/errors';

jest.mock('child_process', () => ({ spawn: jest.fn() }));

class FakeChildProcess extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  kill = jest.fn((_signal?: string) => {
    setImmediate(() => this.emit('close', null));
    return true;
  });
}

const mockSpawn = spawn as unknown as jest.Mock;

describe('parseFfmpegTime', () => {
  it('should read the last time marker', () => {
    expect(parseFfmpegTime('frame=10 time=00:00:01.50 bitrate=1 frame=20 time=00:01:02.25 speed=2x')).toBe(62.25);
  });

  it('should read hours', () => {
    expect(parseFfmpegTime('time=01:00:00.00')).toBe(3600);
  });

  it('should return null without a marker', () => {
    expect(parseFfmpegTime('Press [q] to stop')).toBeNull();
  });
});

describe('FfmpegToolkit', () => {
  let child: FakeChildProcess;
  let toolkit: FfmpegToolkit;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    child = new FakeChildProcess();
    mockSpawn.mockReturnValue(child);
    toolkit = new FfmpegToolkit({ ffmpegPath: '/opt/bin/ffmpeg', ffprobePath: '/opt/bin/ffprobe' });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('probeDuration', () => {
    it('should parse the duration ffprobe prints', async () => {
      const probing = toolkit.probeDuration('/videos/a.mov');
      child.stdout.emit('data', Buffer.from('12.480000\n'));
      child.emit('close', 0);

      await expect(probing).resolves.toBe(12.48);
      expect(mockSpawn).toHaveBeenCalledWith(
        '/opt/bin/ffprobe',
        ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', '/videos/a.mov'],
        { stdio: ['ignore', 'pipe', 'pipe'] }
      );
    });

    it('should reject output that is not a number', async () => {
      const probing = toolkit.probeDuration('/videos/a.mov');
      child.stdout.emit('data', Buffer.from('N/A\n'));
      child.emit('close', 0);

      await expect(probing).rejects.toThrow('Could not read duration of /videos/a.mov');
    });
  });

  describe('exportRange', () => {
    it('should re-encode the range and report progress', async () => {
      const progress: number[] = [];
      const exporting = toolkit.exportRange(
        '/videos/a.mov',
        '/tmp/out.mov',
        { startSeconds: 2, endSeconds: 12 },
        { signal: new AbortController().signal, onProgress: (fraction) => progress.push(fraction) }
      );

      child.stderr.emit('data', Buffer.from('frame=1 time=00:00:05.00 speed=1x'));
      child.emit('close', 0);
      await exporting;

      expect(mockSpawn.mock.calls[0][1]).toEqual([
        '-y',
        '-ss', '2.000',
        '-i', '/videos/a.mov',
        '-t', '10.000',
        '-c:v', 'libx264',
        '-preset', 'veryfast',
        '-c:a', 'aac',
        '-movflags', '+faststart',
        '/tmp/out.mov',
      ]);
      expect(progress).toEqual([0.5, 1]);
    });

    it('should kill the process and reject when aborted', async () => {
      const controller = new AbortController();
      const exporting = toolkit.exportRange(
        '/videos/a.mov',
        '/tmp/out.mov',
        { startSeconds: 0, endSeconds: 4 },
        { signal: controller.signal }
      );

      controller.abort();

      await expect(exporting).rejects.toBeInstanceOf(OperationCancelledError);
      expect(child.kill).toHaveBeenCalledWith('SIGKILL');
    });

    it('should not start when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        toolkit.exportRange('/videos/a.mov', '/tmp/out.mov', { startSeconds: 0, endSeconds: 4 }, { signal: controller.signal })
      ).rejects.toBeInstanceOf(OperationCancelledError);
      expect(mockSpawn).not.toHaveBeenCalled();
    });
  });

  describe('extractFrame', () => {
    it('should scale a single frame', async () => {
      const extracting = toolkit.extractFrame('/videos/a.mov', '/data/thumb.jpg', {
        atSeconds: 1,
        width: 160,
        height: 120,
      });
      child.emit('close', 0);
      await extracting;

      expect(mockSpawn.mock.calls[0][1]).toEqual([
        '-y',
        '-ss', '1.000',
        '-i', '/videos/a.mov',
        '-frames:v', '1',
        '-vf', 'scale=160:120:force_original_aspect_ratio=decrease',
        '-q:v', '4',
        '/data/thumb.jpg',
      ]);
    });

    it('should reject with the stderr tail on a non-zero exit', async () => {
      const extracting = toolkit.extractFrame('/videos/a.mov', '/data/thumb.jpg', {
        atSeconds: 1,
        width: 160,
        height: 120,
      });
      child.stderr.emit('data', Buffer.from('Input #0\nOutput file is empty\n'));
      child.emit('close', 1);

      await expect(extracting).rejects.toThrow(
        '/opt/bin/ffmpeg exited with code 1: Input #0 | Output file is empty'
      );
    });
  });
});

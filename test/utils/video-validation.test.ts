/**
 * Tests for video file validation bounds
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { assertValidVideo, validateVideo } from '../../src/utils/video-validation';
import { VideoValidationError } from '../../src/models/errors';
import { MAX_VIDEO_SIZE_BYTES } from '../../src/models/recording';
import { FakeMediaToolkit } from '../helpers/fake-media-toolkit';
import { makeTempDir, removeTempDir } from '../helpers/temp-dir';

describe('Video Validation', () => {
  let dir: string;
  let probe: FakeMediaToolkit;
  let videoPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    probe = new FakeMediaToolkit();
    videoPath = path.join(dir, 'clip.mov');
    await fs.writeFile(videoPath, 'video bytes');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should accept a file within every bound', async () => {
    probe.durations.set(videoPath, 600);

    const result = await validateVideo(videoPath, probe);

    expect(result).toEqual({
      ok: true,
      video: { path: videoPath, sizeBytes: 11, durationSeconds: 600 },
    });
  });

  it('should accept a file of exactly the maximum size', async () => {
    await fs.truncate(videoPath, MAX_VIDEO_SIZE_BYTES);

    const result = await validateVideo(videoPath, probe);

    expect(result.ok).toBe(true);
  });

  it('should reject a missing file', async () => {
    const result = await validateVideo(path.join(dir, 'missing.mov'), probe);

    expect(result).toEqual({ ok: false, reason: 'file-not-found', message: 'Video file not found.' });
  });

  it('should reject a directory', async () => {
    const result = await validateVideo(dir, probe);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.reason).toBe('file-not-found');
  });

  it('should reject a file one byte over the maximum size', async () => {
    await fs.truncate(videoPath, MAX_VIDEO_SIZE_BYTES + 1);

    const result = await validateVideo(videoPath, probe);

    expect(result).toEqual({
      ok: false,
      reason: 'file-too-large',
      message: 'Video file is too large (500.0 MB). Please select a video under 500MB.',
      sizeBytes: MAX_VIDEO_SIZE_BYTES + 1,
    });
  });

  it('should reject a video longer than ten minutes', async () => {
    probe.durations.set(videoPath, 600.5);

    const result = await validateVideo(videoPath, probe);

    expect(result).toEqual({
      ok: false,
      reason: 'duration-too-long',
      message: 'Video is too long (10 minutes). Please select a video under 10 minutes.',
      sizeBytes: 11,
      durationSeconds: 600.5,
    });
  });

  it('should report an unreadable duration', async () => {
    probe.defaultDuration = -1;

    const result = await validateVideo(videoPath, probe);

    expect(result).toEqual({
      ok: false,
      reason: 'unreadable',
      message: 'Video format is not supported.',
      sizeBytes: 11,
    });
  });

  describe('assertValidVideo', () => {
    it('should return the validated video', async () => {
      probe.durations.set(videoPath, 42);

      await expect(assertValidVideo(videoPath, probe)).resolves.toEqual({
        path: videoPath,
        sizeBytes: 11,
        durationSeconds: 42,
      });
    });

    it('should throw VideoValidationError with the failing reason', async () => {
      probe.durations.set(videoPath, 900);

      const error = await assertValidVideo(videoPath, probe).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(VideoValidationError);
      expect(error).toMatchObject({ reason: 'duration-too-long', details: { durationSeconds: 900 } });
    });
  });
});

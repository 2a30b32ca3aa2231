/**
 * Recording Pipeline Tests
 *
 * End-to-end runs over the in-memory repositories, a scripted media toolkit
 * and real temp directories.
 */

import { promises as fs } from 'fs';
import { transaction } from '../../src/config/database';
import { RecordingPipeline } from '../../src/services/recording-pipeline';
import { PermissionService } from '../../src/services/permission-service';
import { NotificationService } from '../../src/services/notification-service';
import { StorageMonitor, VolumeStats } from '../../src/services/storage-monitor';
import { VideoFileStore } from '../../src/services/video-file-store';
import {
  AnnotationDecision,
  PipelineHooks,
  PipelineOutcome,
  PipelineRequest,
  PipelineStage,
} from '../../src/models/pipeline';
import { CaptureSource, CapturedVideo } from '../../src/models/recording';
import { ValidatedVideo } from '../../src/models/media';
import { PlayResultType } from '../../src/models/play-result';
import { StatisticsOwner } from '../../src/models/statistics';
import { BadRequestError, OperationCancelledError } from '../../src/models/errors';
import { buildClipServices, ClipServices, useInMemoryTransactions } from '../helpers/clip-services';
import { FakePermissionProvider } from '../helpers/fake-permissions';
import { listFiles, makeTempDir, removeTempDir } from '../helpers/temp-dir';

jest.mock('../../src/config/database', () => ({ transaction: jest.fn() }));

class FakeCameraSource implements CaptureSource {
  readonly origin = 'camera' as const;
  acquired = 0;
  /** When set, recording waits until the run is aborted */
  hangs = false;
  /** Resolves once acquire has been called */
  started: Promise<void>;
  private markStarted: () => void = () => undefined;

  constructor(private files: VideoFileStore) {
    this.started = new Promise<void>((resolve) => {
      this.markStarted = resolve;
    });
  }

  async acquire(signal: AbortSignal): Promise<CapturedVideo> {
    this.acquired += 1;
    this.markStarted();
    if (this.hangs) {
      await new Promise<void>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new OperationCancelledError('capture')), { once: true });
      });
    }
    await this.files.ensureDirectories();
    const path = this.files.tempPath();
    await fs.writeFile(path, 'recorded video');
    return { path, origin: 'camera', isTemporary: true };
  }
}

const GB = 1_000_000_000;

function volume(availableBytes: number): VolumeStats {
  return { bavail: availableBytes / 1000, bsize: 1000, blocks: (1000 * GB) / 1000 };
}

describe('RecordingPipeline', () => {
  let root: string;
  let services: ClipServices;
  let permissions: FakePermissionProvider;
  let camera: FakeCameraSource;
  let availableBytes: number;
  let pipeline: RecordingPipeline;
  let athleteId: string;
  let stages: PipelineStage[];
  let thumbnails: Array<Promise<unknown>>;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();

    root = await makeTempDir();
    services = buildClipServices(root);
    useInMemoryTransactions(transaction as jest.Mock, () => services.db);
    await services.files.ensureDirectories();

    permissions = new FakePermissionProvider();
    camera = new FakeCameraSource(services.files);
    availableBytes = 600 * GB;
    stages = [];
    thumbnails = [];

    pipeline = new RecordingPipeline({
      permissions: new PermissionService(permissions),
      storage: new StorageMonitor(root, { statfs: async () => volume(availableBytes) }),
      sources: { camera },
      toolkit: services.toolkit,
      files: services.files,
      persistence: services.persistence,
    });

    athleteId = (await services.athleteRepository.create('Sam Rivera')).id;
  });

  afterEach(async () => {
    await Promise.all(thumbnails);
    jest.restoreAllMocks();
    await removeTempDir(root);
  });

  async function runPipeline(
    request: PipelineRequest,
    runHooks: PipelineHooks,
    signal?: AbortSignal
  ): Promise<PipelineOutcome> {
    const outcome = await pipeline.run(request, runHooks, signal);
    if (outcome.status === 'saved') {
      thumbnails.push(outcome.thumbnail);
    }
    return outcome;
  }

  function hooks(overrides: Partial<PipelineHooks> = {}): PipelineHooks {
    return {
      onStage: (stage) => stages.push(stage),
      annotate: async () => ({ action: 'save', playResult: PlayResultType.SINGLE }),
      ...overrides,
    };
  }

  describe('run', () => {
    it('should save a recorded clip and remove the temp recording', async () => {
      const outcome = await runPipeline({ athleteId, source: 'camera' }, hooks());

      expect(outcome.status).toBe('saved');
      if (outcome.status !== 'saved') {
        return;
      }
      expect(outcome.clip.athlete_id).toBe(athleteId);
      expect(outcome.clip.duration_seconds).toBe(12);
      expect(outcome.clip.play_result?.type).toBe(PlayResultType.SINGLE);
      await expect(outcome.thumbnail).resolves.toHaveProperty('status', 'attached');

      expect(await listFiles(services.files.tempDir)).toEqual([]);
      expect(await listFiles(services.files.documentsDir)).toHaveLength(2);
      expect(services.db.statisticsFor(StatisticsOwner.ATHLETE, athleteId)).toMatchObject({
        at_bats: 1,
        hits: 1,
      });
      expect(pipeline.isRunning).toBe(false);
    });

    it('should report stages in order', async () => {
      await runPipeline({ athleteId, source: 'camera' }, hooks());

      expect(stages).toEqual(['permission', 'storage', 'capture', 'validate', 'annotate', 'persist', 'cleanup']);
    });

    it('should delete the recording when the user discards it', async () => {
      const outcome = await runPipeline(
        { athleteId, source: 'camera' },
        hooks({ annotate: async () => ({ action: 'discard' }) })
      );

      expect(outcome).toEqual({ status: 'discarded', runId: expect.any(String) });
      expect(await listFiles(services.files.tempDir)).toEqual([]);
      expect(await listFiles(services.files.documentsDir)).toEqual([]);
      expect(await services.clipRepository.findByAthleteId(athleteId)).toEqual([]);
    });

    it('should report a committed save as saved when the completion notification fails', async () => {
      jest.spyOn(permissions, 'status').mockImplementation(async (capability) => {
        if (capability === 'notifications') {
          throw new Error('notification settings unavailable');
        }
        return 'authorized';
      });
      const permissionService = new PermissionService(permissions);
      pipeline = new RecordingPipeline({
        permissions: permissionService,
        storage: new StorageMonitor(root, { statfs: async () => volume(availableBytes) }),
        sources: { camera },
        toolkit: services.toolkit,
        files: services.files,
        persistence: services.persistence,
        notifications: new NotificationService({ send: async () => undefined }, permissionService),
      });

      const outcome = await runPipeline({ athleteId, source: 'camera' }, hooks());

      expect(outcome.status).toBe('saved');
      expect(await services.clipRepository.findByAthleteId(athleteId)).toHaveLength(1);
      expect(services.db.statisticsFor(StatisticsOwner.ATHLETE, athleteId)).toMatchObject({ at_bats: 1, hits: 1 });
    });

    it('should report a committed save as saved when a stage listener throws after persisting', async () => {
      const outcome = await runPipeline(
        { athleteId, source: 'camera' },
        hooks({
          onStage: (stage) => {
            if (stage === 'cleanup') {
              throw new Error('listener failed');
            }
          },
        })
      );

      expect(outcome.status).toBe('saved');
      expect(await services.clipRepository.findByAthleteId(athleteId)).toHaveLength(1);
    });

    it('should send a completion notification after saving', async () => {
      const send = jest.fn(async () => undefined);
      const permissionService = new PermissionService(permissions);
      pipeline = new RecordingPipeline({
        permissions: permissionService,
        storage: new StorageMonitor(root, { statfs: async () => volume(availableBytes) }),
        sources: { camera },
        toolkit: services.toolkit,
        files: services.files,
        persistence: services.persistence,
        notifications: new NotificationService({ send }, permissionService),
      });

      await runPipeline({ athleteId, source: 'camera' }, hooks());

      expect(send).toHaveBeenCalledWith({ title: 'Clip saved', body: 'Your video clip has been saved.' });
    });

    it('should reject a second run while one is active', async () => {
      let finishAnnotation: (decision: AnnotationDecision) => void = () => undefined;
      let annotating: () => void = () => undefined;
      const annotationStarted = new Promise<void>((resolve) => {
        annotating = resolve;
      });

      const first = runPipeline(
        { athleteId, source: 'camera' },
        hooks({
          annotate: () =>
            new Promise<AnnotationDecision>((resolve) => {
              finishAnnotation = resolve;
              annotating();
            }),
        })
      );
      await annotationStarted;

      const error = await runPipeline({ athleteId, source: 'camera' }, hooks()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BadRequestError);
      expect(error).toHaveProperty('code', 'PIPELINE_BUSY');

      finishAnnotation({ action: 'discard' });
      await expect(first).resolves.toHaveProperty('status', 'discarded');
      expect(pipeline.isRunning).toBe(false);
    });
  });

  describe('permission gate', () => {
    it('should fail with an open-settings remediation when the camera is denied', async () => {
      permissions.statuses.camera = 'denied';

      const outcome = await runPipeline({ athleteId, source: 'camera' }, hooks());

      expect(outcome).toMatchObject({
        status: 'failed',
        stage: 'permission',
        error: {
          category: 'permission-denied',
          remediation: 'open-settings',
          message: 'Camera access is required to record videos. Please enable camera access in Settings.',
        },
      });
      expect(camera.acquired).toBe(0);
    });

    it('should prompt when the microphone is undecided', async () => {
      permissions.statuses.microphone = 'not-determined';
      permissions.grants.microphone = true;

      const outcome = await runPipeline({ athleteId, source: 'camera' }, hooks());

      expect(outcome.status).toBe('saved');
      expect(permissions.requested).toEqual(['microphone']);
    });

    it('should fail at capture when no source is configured for the origin', async () => {
      const outcome = await runPipeline({ athleteId, source: 'library' }, hooks());

      expect(outcome).toMatchObject({
        status: 'failed',
        stage: 'capture',
        error: { category: 'capability-unavailable', message: 'No library source is configured.' },
      });
    });
  });

  describe('storage check', () => {
    it('should cancel on low storage when the user is not asked', async () => {
      availableBytes = 300_000_000;

      const outcome = await runPipeline({ athleteId, source: 'camera' }, hooks());

      expect(outcome).toEqual({ status: 'cancelled', runId: expect.any(String), stage: 'storage' });
      expect(camera.acquired).toBe(0);
    });

    it('should continue on low storage when the user agrees', async () => {
      availableBytes = 300_000_000;
      const onLowStorage = jest.fn(async () => 'continue' as const);

      const outcome = await runPipeline({ athleteId, source: 'camera' }, hooks({ onLowStorage }));

      expect(outcome.status).toBe('saved');
      expect(onLowStorage).toHaveBeenCalledWith(expect.objectContaining({ level: 'low', isLow: true }));
    });

    it('should continue when free space cannot be read', async () => {
      pipeline = new RecordingPipeline({
        permissions: new PermissionService(permissions),
        storage: new StorageMonitor(root, {
          statfs: async () => {
            throw new Error('statfs unavailable');
          },
        }),
        sources: { camera },
        toolkit: services.toolkit,
        files: services.files,
        persistence: services.persistence,
      });

      const outcome = await runPipeline({ athleteId, source: 'camera' }, hooks());

      expect(outcome.status).toBe('saved');
    });
  });

  describe('validation', () => {
    it('should fail and clean up a video longer than ten minutes', async () => {
      services.toolkit.defaultDuration = 700;

      const outcome = await runPipeline({ athleteId, source: 'camera' }, hooks());

      expect(outcome).toMatchObject({
        status: 'failed',
        stage: 'validate',
        error: {
          category: 'validation-failure',
          message: 'Video is too long (11 minutes). Please select a video under 10 minutes.',
        },
      });
      expect(await listFiles(services.files.tempDir)).toEqual([]);
    });
  });

  describe('trim', () => {
    it('should save the trimmed range', async () => {
      const progress: number[] = [];
      const annotated: ValidatedVideo[] = [];

      const outcome = await runPipeline(
        { athleteId, source: 'camera' },
        hooks({
          chooseTrimRange: async () => ({ startSeconds: 2, endSeconds: 8 }),
          onTrimProgress: (fraction) => progress.push(fraction),
          annotate: async (video) => {
            annotated.push(video);
            return { action: 'save' };
          },
        })
      );

      expect(outcome.status).toBe('saved');
      expect(progress).toEqual([0.5, 1]);
      expect(annotated[0].durationSeconds).toBe(6);
      expect(annotated[0].sizeBytes).toBe(Buffer.byteLength('trimmed video'));
      expect(annotated[0].path).toBe(services.toolkit.exportCalls[0].outputPath);
      if (outcome.status === 'saved') {
        expect(outcome.clip.duration_seconds).toBe(6);
      }
      expect(stages).toContain('trim');
      expect(await listFiles(services.files.tempDir)).toEqual([]);
    });

    it('should keep the whole video when no range is chosen', async () => {
      const outcome = await runPipeline(
        { athleteId, source: 'camera' },
        hooks({ chooseTrimRange: async () => null })
      );

      expect(outcome.status).toBe('saved');
      expect(services.toolkit.exportCalls).toEqual([]);
    });

    it('should retry a failed export when asked', async () => {
      services.toolkit.exportBehaviors = ['fail', 'succeed'];
      const onTrimFailed = jest.fn(async () => 'retry' as const);

      const outcome = await runPipeline(
        { athleteId, source: 'camera' },
        hooks({ chooseTrimRange: async () => ({ startSeconds: 0, endSeconds: 4 }), onTrimFailed })
      );

      expect(outcome.status).toBe('saved');
      expect(services.toolkit.exportCalls).toHaveLength(2);
      expect(onTrimFailed).toHaveBeenCalledWith(expect.objectContaining({ message: 'Trim failed: encoder error' }));
    });

    it('should save the untrimmed video when the user skips a failed trim', async () => {
      services.toolkit.exportBehaviors = ['fail'];
      const annotated: ValidatedVideo[] = [];

      const outcome = await runPipeline(
        { athleteId, source: 'camera' },
        hooks({
          chooseTrimRange: async () => ({ startSeconds: 0, endSeconds: 4 }),
          onTrimFailed: async () => 'skip',
          annotate: async (video) => {
            annotated.push(video);
            return { action: 'save' };
          },
        })
      );

      expect(outcome.status).toBe('saved');
      expect(annotated[0].durationSeconds).toBe(12);
    });

    it('should fail the run when a failed trim is not handled', async () => {
      services.toolkit.exportBehaviors = ['fail'];

      const outcome = await runPipeline(
        { athleteId, source: 'camera' },
        hooks({ chooseTrimRange: async () => ({ startSeconds: 0, endSeconds: 4 }) })
      );

      expect(outcome).toMatchObject({
        status: 'failed',
        stage: 'trim',
        error: { category: 'export-failure', message: 'Trim failed: encoder error' },
      });
      expect(await listFiles(services.files.tempDir)).toEqual([]);
    });
  });

  describe('cancellation', () => {
    it('should cancel a recording in progress on dismiss', async () => {
      camera.hangs = true;

      const running = runPipeline({ athleteId, source: 'camera' }, hooks());
      await camera.started;
      pipeline.dismiss();

      await expect(running).resolves.toEqual({ status: 'cancelled', runId: expect.any(String), stage: 'capture' });
      expect(pipeline.isRunning).toBe(false);
    });

    it('should cancel while waiting for the annotation and remove the recording', async () => {
      let annotating: () => void = () => undefined;
      const annotationStarted = new Promise<void>((resolve) => {
        annotating = resolve;
      });

      const running = runPipeline(
        { athleteId, source: 'camera' },
        hooks({
          annotate: () => {
            annotating();
            return new Promise<AnnotationDecision>(() => undefined);
          },
        })
      );
      await annotationStarted;
      pipeline.dismiss();

      await expect(running).resolves.toHaveProperty('stage', 'annotate');
      expect(await listFiles(services.files.tempDir)).toEqual([]);
      expect(await services.clipRepository.findByAthleteId(athleteId)).toEqual([]);
    });

    it('should honour a signal that is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const outcome = await runPipeline({ athleteId, source: 'camera' }, hooks(), controller.signal);

      expect(outcome).toEqual({ status: 'cancelled', runId: expect.any(String), stage: 'permission' });
      expect(camera.acquired).toBe(0);
    });

    it('should be a no-op when idle', () => {
      expect(() => pipeline.dismiss()).not.toThrow();
    });
  });
});

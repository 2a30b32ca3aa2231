/**
 * Recording Pipeline
 *
 * Runs one video end to end: permission gate, storage check, capture or
 * import, validation, optional trim, annotation, persistence and cleanup.
 * One run at a time per instance; dismiss() cancels the run in flight.
 *
 * Every stage checks the run's AbortSignal before it starts and after it
 * finishes. Whatever the outcome, the temp files the run created are removed.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AnnotationDecision,
  PipelineHooks,
  PipelineOutcome,
  PipelineRequest,
  PipelineStage,
} from '../models/pipeline';
import { Capability } from '../models/permission';
import { CaptureOrigin, CaptureSource } from '../models/recording';
import { MediaToolkit, ValidatedVideo } from '../models/media';
import { StorageStatus } from '../models/storage';
import {
  BadRequestError,
  CapabilityUnavailableError,
  ExportError,
  OperationCancelledError,
  VideoValidationError,
  describeError,
} from '../models/errors';
import { PermissionService } from './permission-service';
import { StorageMonitor } from './storage-monitor';
import { TrimSession } from './trim-session';
import { VideoFileStore } from './video-file-store';
import { ClipPersistenceService } from './clip-persistence-service';
import { NotificationService } from './notification-service';
import { assertValidVideo } from '../utils/video-validation';
import { checkpoint, isCancellation, raceAbort } from '../utils/cancellation';
import { errorMessage } from '../utils/fs-errors';
import { log, LogLevel, logPipelineStage } from '../utils/logger';
import { emitValidationFailure } from '../utils/metrics';

const CAMERA_CAPABILITIES: Capability[] = ['camera', 'microphone'];

export interface RecordingPipelineDependencies {
  permissions: PermissionService;
  storage: StorageMonitor;
  sources: Partial<Record<CaptureOrigin, CaptureSource>>;
  toolkit: MediaToolkit;
  files: VideoFileStore;
  persistence: ClipPersistenceService;
  /** When set, a completion notification is sent after each save */
  notifications?: NotificationService;
}

/**
 * Per-run bookkeeping
 */
interface RunContext {
  runId: string;
  request: PipelineRequest;
  hooks: PipelineHooks;
  signal: AbortSignal;
  stage: PipelineStage;
  stageStartedAt: number;
  tempPaths: string[];
}

export class RecordingPipeline {
  private active: AbortController | null = null;

  constructor(private deps: RecordingPipelineDependencies) {}

  get isRunning(): boolean {
    return this.active !== null;
  }

  /**
   * Cancel the run in flight; a no-op when idle
   */
  dismiss(): void {
    this.active?.abort();
  }

  /**
   * Run the pipeline once
   *
   * Failures are returned as outcomes; only a concurrent start throws.
   *
   * @throws BadRequestError (code PIPELINE_BUSY) while another run is active
   */
  async run(request: PipelineRequest, hooks: PipelineHooks, signal?: AbortSignal): Promise<PipelineOutcome> {
    if (this.active) {
      throw new BadRequestError('A recording is already in progress', 'PIPELINE_BUSY');
    }

    const controller = new AbortController();
    this.active = controller;

    const forwardAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const context: RunContext = {
      runId: uuidv4(),
      request,
      hooks,
      signal: controller.signal,
      stage: 'permission',
      stageStartedAt: Date.now(),
      tempPaths: [],
    };

    try {
      return await this.execute(context);
    } catch (error) {
      return this.toOutcome(context, error);
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
      await this.deps.files.cleanup(context.tempPaths, request.athleteId);
      this.active = null;
    }
  }

  private async execute(context: RunContext): Promise<PipelineOutcome> {
    const { request, hooks, signal, runId } = context;

    // Permission gate
    this.enterStage(context, 'permission');
    if (request.source === 'camera') {
      const permission = await this.deps.permissions.ensure(CAMERA_CAPABILITIES);
      if (permission.status !== 'authorized') {
        throw this.deps.permissions.toError(permission);
      }
    }
    checkpoint(signal, 'permission');

    // Storage check (advisory)
    this.enterStage(context, 'storage');
    await this.checkStorage(context);

    // Capture or import
    this.enterStage(context, 'capture');
    const source = this.deps.sources[request.source];
    if (!source) {
      throw new CapabilityUnavailableError(`No ${request.source} source is configured.`);
    }
    const captured = await source.acquire(signal);
    if (captured.isTemporary) {
      context.tempPaths.push(captured.path);
    }
    checkpoint(signal, 'capture');

    // Validation
    this.enterStage(context, 'validate');
    let video: ValidatedVideo;
    try {
      video = await assertValidVideo(captured.path, this.deps.toolkit);
    } catch (error) {
      if (error instanceof VideoValidationError) {
        await emitValidationFailure(error.reason);
      }
      throw error;
    }
    checkpoint(signal, 'validate');

    // Optional trim
    if (hooks.chooseTrimRange) {
      this.enterStage(context, 'trim');
      video = await this.trim(context, video);
      checkpoint(signal, 'trim');
    }

    // Annotation
    this.enterStage(context, 'annotate');
    const decision: AnnotationDecision = await raceAbort(hooks.annotate(video), signal, 'annotate');
    checkpoint(signal, 'annotate');

    if (decision.action === 'discard') {
      this.completeStage(context);
      log(LogLevel.INFO, 'Recording discarded', { run_id: runId, athlete_id: request.athleteId });
      return { status: 'discarded', runId };
    }

    // Persistence
    this.enterStage(context, 'persist');
    const saved = await this.deps.persistence.saveClip(
      {
        sourcePath: video.path,
        athleteId: request.athleteId,
        gameId: request.gameId,
        practiceId: request.practiceId,
        playResult: decision.playResult,
        pitchSpeed: decision.pitchSpeed,
        durationSeconds: video.durationSeconds,
      },
      signal
    );

    // The save has committed; nothing after this point changes the outcome
    await this.afterSave(context);

    return { status: 'saved', runId, clip: saved.clip, thumbnail: saved.thumbnail };
  }

  /**
   * Post-commit steps, logged instead of thrown
   */
  private async afterSave(context: RunContext): Promise<void> {
    try {
      this.enterStage(context, 'cleanup');
      if (this.deps.notifications) {
        await this.deps.notifications.notifyCompletion('Clip saved', 'Your video clip has been saved.');
      }
      this.completeStage(context);
    } catch (error) {
      log(LogLevel.WARN, 'Post-save step failed', {
        run_id: context.runId,
        athlete_id: context.request.athleteId,
        error: errorMessage(error),
      });
    }
  }

  private async checkStorage(context: RunContext): Promise<void> {
    let status: StorageStatus;
    try {
      status = await this.deps.storage.check();
    } catch (error) {
      log(LogLevel.WARN, 'Storage check failed, continuing', {
        run_id: context.runId,
        error: errorMessage(error),
      });
      return;
    }

    if (!status.isLow) {
      return;
    }

    const decision = context.hooks.onLowStorage
      ? await raceAbort(context.hooks.onLowStorage(status), context.signal, 'storage')
      : 'cancel';

    if (decision !== 'continue') {
      throw new OperationCancelledError('storage');
    }
    checkpoint(context.signal, 'storage');
  }

  /**
   * Trim until it succeeds, the user skips it or the user gives up
   */
  private async trim(context: RunContext, video: ValidatedVideo): Promise<ValidatedVideo> {
    const { hooks, signal } = context;
    if (!hooks.chooseTrimRange) {
      return video;
    }

    const range = await raceAbort(hooks.chooseTrimRange(video), signal, 'trim');
    if (!range) {
      return video;
    }

    const session = new TrimSession(this.deps.toolkit, this.deps.files);

    for (;;) {
      try {
        const outputPath = await session.start(video.path, range, {
          durationSeconds: video.durationSeconds,
          onProgress: hooks.onTrimProgress,
          signal,
        });
        context.tempPaths.push(outputPath);
        return {
          path: outputPath,
          sizeBytes: await this.deps.files.sizeOf(outputPath),
          durationSeconds: range.endSeconds - range.startSeconds,
        };
      } catch (error) {
        if (!(error instanceof ExportError) || error.reason === 'cancelled' || signal.aborted) {
          throw error;
        }

        const decision = hooks.onTrimFailed
          ? await raceAbort(hooks.onTrimFailed(error), signal, 'trim')
          : 'abort';

        if (decision === 'skip') {
          return video;
        }
        if (decision === 'abort') {
          throw error;
        }
        session.reset();
      }
    }
  }

  private enterStage(context: RunContext, stage: PipelineStage): void {
    if (context.stage !== stage) {
      this.completeStage(context);
    }
    context.stage = stage;
    context.stageStartedAt = Date.now();
    context.hooks.onStage?.(stage);
    logPipelineStage({
      runId: context.runId,
      athleteId: context.request.athleteId,
      stage,
      outcome: 'started',
    });
  }

  private completeStage(context: RunContext): void {
    logPipelineStage({
      runId: context.runId,
      athleteId: context.request.athleteId,
      stage: context.stage,
      outcome: 'completed',
      durationMs: Date.now() - context.stageStartedAt,
    });
  }

  private toOutcome(context: RunContext, error: unknown): PipelineOutcome {
    const durationMs = Date.now() - context.stageStartedAt;

    const cancelled =
      isCancellation(error) ||
      (error instanceof ExportError && error.reason === 'cancelled') ||
      context.signal.aborted;

    if (cancelled) {
      logPipelineStage({
        runId: context.runId,
        athleteId: context.request.athleteId,
        stage: context.stage,
        outcome: 'cancelled',
        durationMs,
      });
      return { status: 'cancelled', runId: context.runId, stage: context.stage };
    }

    logPipelineStage({
      runId: context.runId,
      athleteId: context.request.athleteId,
      stage: context.stage,
      outcome: 'failed',
      durationMs,
      errorMessage: errorMessage(error),
    });

    return {
      status: 'failed',
      runId: context.runId,
      stage: context.stage,
      error: describeError(error),
      cause: error,
    };
  }
}

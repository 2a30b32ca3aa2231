/**
 * Recording Pipeline Models
 *
 * Request, hooks and outcome of one capture-to-persistence run.
 */

import { ErrorDescription, ExportError } from './errors';
import { TimeRange, ValidatedVideo } from './media';
import { PlayResultType } from './play-result';
import { CaptureOrigin } from './recording';
import { StorageStatus } from './storage';
import { ThumbnailOutcome, VideoClip } from './video-clip';

export type PipelineStage =
  | 'permission'
  | 'storage'
  | 'capture'
  | 'validate'
  | 'trim'
  | 'annotate'
  | 'persist'
  | 'cleanup';

export interface PipelineRequest {
  athleteId: string;
  source: CaptureOrigin;
  gameId?: string;
  practiceId?: string;
}

export type AnnotationDecision =
  | { action: 'save'; playResult?: PlayResultType; pitchSpeed?: number }
  | { action: 'discard' };

export type TrimFailureDecision = 'retry' | 'skip' | 'abort';

/**
 * Presentation-layer callbacks the pipeline waits on
 */
export interface PipelineHooks {
  onStage?(stage: PipelineStage): void;
  /** Asked when free space is low; anything but 'continue' cancels */
  onLowStorage?(status: StorageStatus): Promise<'continue' | 'cancel'>;
  /** Resolve null to keep the whole video */
  chooseTrimRange?(video: ValidatedVideo): Promise<TimeRange | null>;
  onTrimProgress?(fraction: number): void;
  /** Defaults to 'abort' */
  onTrimFailed?(error: ExportError): Promise<TrimFailureDecision>;
  annotate(video: ValidatedVideo): Promise<AnnotationDecision>;
}

export type PipelineOutcome =
  | { status: 'saved'; runId: string; clip: VideoClip; thumbnail: Promise<ThumbnailOutcome> }
  | { status: 'discarded'; runId: string }
  | { status: 'cancelled'; runId: string; stage: PipelineStage }
  | { status: 'failed'; runId: string; stage: PipelineStage; error: ErrorDescription; cause: unknown };

/**
 * Diamond Clips
 *
 * Video capture-to-persistence pipeline for amateur baseball and softball
 * clips. createClipPipeline() wires the services together; platform
 * capabilities (permissions, camera, media picker, notifications) are
 * supplied by the host application.
 */

import { EnvironmentConfig, loadEnvironmentConfig } from './config/environment';
import { CameraDevice, MediaPicker, CaptureSource } from './models/recording';
import { MediaToolkit } from './models/media';
import { BatteryProvider, ConnectivityProvider } from './models/device';
import { PermissionProvider } from './models/permission';
import { AthleteRepository } from './repositories/athlete-repository';
import { GameRepository } from './repositories/game-repository';
import { PracticeRepository } from './repositories/practice-repository';
import { SeasonRepository } from './repositories/season-repository';
import { StatisticsRepository } from './repositories/statistics-repository';
import { VideoClipRepository } from './repositories/video-clip-repository';
import { AthleteService } from './services/athlete-service';
import { BatteryMonitor } from './services/battery-monitor';
import { CameraCaptureSource, LibraryImportSource } from './services/capture-sources';
import { ClipEventBus } from './services/clip-event-bus';
import { ClipPersistenceService } from './services/clip-persistence-service';
import { ClipService } from './services/clip-service';
import { ConnectivityMonitor } from './services/connectivity-monitor';
import { CsvExportService } from './services/csv-export-service';
import { FfmpegToolkit } from './services/ffmpeg-toolkit';
import { GameService } from './services/game-service';
import { NotificationSender, NotificationService } from './services/notification-service';
import { PermissionService } from './services/permission-service';
import { PracticeService } from './services/practice-service';
import { RecordingPipeline } from './services/recording-pipeline';
import { RecordingSettingsStore } from './services/recording-settings-store';
import { SeasonService } from './services/season-service';
import { StatisticsService } from './services/statistics-service';
import { StorageMonitor } from './services/storage-monitor';
import { ThumbnailService } from './services/thumbnail-service';
import { VideoFileStore } from './services/video-file-store';

export * from './config/environment';
export { closePool, isPoolHealthy } from './config/database';
export * from './models/athlete';
export * from './models/device';
export * from './models/errors';
export * from './models/events';
export * from './models/game';
export * from './models/media';
export * from './models/permission';
export * from './models/pipeline';
export * from './models/play-result';
export * from './models/recording';
export * from './models/season';
export * from './models/statistics';
export * from './models/storage';
export * from './models/video-clip';
export {
  battingAverage,
  formatOps,
  formatRate,
  onBasePercentage,
  onBasePlusSlugging,
  sluggingPercentage,
  strikePercentage,
  ManualStatisticsEntry,
} from './utils/play-result-statistics';
export { validateVideo, assertValidVideo } from './utils/video-validation';
export { escapeCsv } from './utils/csv';
export { runMigrations } from './scripts/run-migrations';
export {
  AthleteService,
  BatteryMonitor,
  CameraCaptureSource,
  ClipEventBus,
  ClipPersistenceService,
  ClipService,
  ConnectivityMonitor,
  CsvExportService,
  FfmpegToolkit,
  GameService,
  LibraryImportSource,
  NotificationSender,
  NotificationService,
  PermissionService,
  PracticeService,
  RecordingPipeline,
  RecordingSettingsStore,
  SeasonService,
  StatisticsService,
  StorageMonitor,
  ThumbnailService,
  VideoFileStore,
};
export { TrimSession, validateTrimRange } from './services/trim-session';
export { allowsUploads, describeConnectivity } from './services/connectivity-monitor';
export { classifyBattery } from './services/battery-monitor';
export { PlayByPlayFilters } from './services/csv-export-service';

/**
 * Capabilities the host application provides
 */
export interface PlatformCapabilities {
  permissions: PermissionProvider;
  camera?: CameraDevice;
  picker?: MediaPicker;
  notifications?: NotificationSender;
  connectivity?: ConnectivityProvider;
  battery?: BatteryProvider;
  /** Replaces the ffmpeg toolkit, e.g. with a native export session */
  media?: MediaToolkit;
}

export interface ClipPipeline {
  config: EnvironmentConfig;
  events: ClipEventBus;
  files: VideoFileStore;
  settings: RecordingSettingsStore;
  storage: StorageMonitor;
  permissions: PermissionService;
  thumbnails: ThumbnailService;
  persistence: ClipPersistenceService;
  pipeline: RecordingPipeline;
  athletes: AthleteService;
  seasons: SeasonService;
  games: GameService;
  practices: PracticeService;
  clips: ClipService;
  statistics: StatisticsService;
  exports: CsvExportService;
  notifications?: NotificationService;
  connectivity?: ConnectivityMonitor;
  battery?: BatteryMonitor;
}

/**
 * Build the service graph
 *
 * Loads recording settings and creates the storage directories before
 * returning.
 */
export async function createClipPipeline(
  platform: PlatformCapabilities,
  config: EnvironmentConfig = loadEnvironmentConfig()
): Promise<ClipPipeline> {
  const events = new ClipEventBus();
  const files = new VideoFileStore({ documentsDir: config.documentsDir, tempDir: config.tempDir });
  await files.ensureDirectories();

  const settings = new RecordingSettingsStore(config.settingsFile);
  await settings.load();

  const toolkit =
    platform.media ??
    new FfmpegToolkit({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath });

  const athleteRepository = new AthleteRepository();
  const seasonRepository = new SeasonRepository();
  const gameRepository = new GameRepository();
  const practiceRepository = new PracticeRepository();
  const clipRepository = new VideoClipRepository();
  const statisticsRepository = new StatisticsRepository();

  const permissions = new PermissionService(platform.permissions);
  const storage = new StorageMonitor(config.documentsDir, { events });
  const seasons = new SeasonService(seasonRepository, statisticsRepository);
  const thumbnails = new ThumbnailService(toolkit, files, clipRepository, events);
  const persistence = new ClipPersistenceService({
    files,
    clipRepository,
    statisticsRepository,
    athleteRepository,
    gameRepository,
    practiceRepository,
    seasonService: seasons,
    thumbnails,
    events,
  });
  const notifications = platform.notifications
    ? new NotificationService(platform.notifications, permissions)
    : undefined;

  const sources: Partial<Record<'camera' | 'library', CaptureSource>> = {};
  if (platform.camera) {
    sources.camera = new CameraCaptureSource(platform.camera, settings, files);
  }
  if (platform.picker) {
    sources.library = new LibraryImportSource(platform.picker, files);
  }

  const pipeline = new RecordingPipeline({
    permissions,
    storage,
    sources,
    toolkit,
    files,
    persistence,
    notifications,
  });

  return {
    config,
    events,
    files,
    settings,
    storage,
    permissions,
    thumbnails,
    persistence,
    pipeline,
    athletes: new AthleteService(
      athleteRepository,
      statisticsRepository,
      clipRepository,
      gameRepository,
      seasons,
      files
    ),
    seasons,
    games: new GameService(gameRepository, statisticsRepository, athleteRepository, seasons),
    practices: new PracticeService(practiceRepository, athleteRepository, seasons),
    clips: new ClipService(clipRepository, files, events),
    statistics: new StatisticsService(
      statisticsRepository,
      gameRepository,
      clipRepository,
      athleteRepository,
      seasonRepository
    ),
    exports: new CsvExportService(
      athleteRepository,
      seasonRepository,
      gameRepository,
      clipRepository,
      statisticsRepository,
      files
    ),
    notifications,
    connectivity: platform.connectivity
      ? new ConnectivityMonitor(platform.connectivity, { events })
      : undefined,
    battery: platform.battery
      ? new BatteryMonitor(platform.battery, { events, quality: () => settings.get().quality })
      : undefined,
  };
}

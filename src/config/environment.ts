/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * All configuration values should be accessed through this module.
 */

import * as os from 'os';
import * as path from 'path';

export interface EnvironmentConfig {
  // Database configuration
  dbHost: string;
  dbPort: number;
  dbName: string;
  dbUser: string;
  dbPassword: string;
  dbSsl: boolean;

  // File storage configuration
  documentsDir: string;
  tempDir: string;
  settingsFile: string;

  // Media tooling
  ffmpegPath: string;
  ffprobePath: string;

  // Metrics configuration
  metricsEnabled: boolean;
  awsRegion: string;

  // Application configuration
  logLevel: string;
  nodeEnv: string;
}

/**
 * Load and validate environment configuration
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  const documentsDir = process.env.CLIPS_DOCUMENTS_DIR || path.join(process.cwd(), 'data', 'documents');

  return {
    dbHost: process.env.DB_HOST || '',
    dbPort: parseInt(process.env.DB_PORT || '5432', 10),
    dbName: process.env.DB_NAME || '',
    dbUser: process.env.DB_USER || '',
    dbPassword: process.env.DB_PASSWORD || '',
    dbSsl: process.env.DB_SSL === 'true',
    documentsDir,
    tempDir: process.env.CLIPS_TEMP_DIR || path.join(os.tmpdir(), 'diamond-clips'),
    settingsFile: process.env.CLIPS_SETTINGS_FILE || path.join(documentsDir, 'recording-settings.json'),
    ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
    ffprobePath: process.env.FFPROBE_PATH || 'ffprobe',
    metricsEnabled: process.env.METRICS_ENABLED === 'true',
    awsRegion: process.env.AWS_REGION || 'us-east-1',
    logLevel: process.env.LOG_LEVEL || 'info',
    nodeEnv: process.env.NODE_ENV || 'development',
  };
}

/**
 * Validate that all required environment variables are set
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const requiredFields: (keyof EnvironmentConfig)[] = [
    'dbHost',
    'dbName',
    'dbUser',
  ];

  const missingFields = requiredFields.filter((field) => !config[field]);

  if (missingFields.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingFields.join(', ')}`
    );
  }
}

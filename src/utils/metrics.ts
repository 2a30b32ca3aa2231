/**
 * CloudWatch Metrics Utilities
 *
 * Provides functions to emit custom CloudWatch metrics for the clip pipeline:
 * save and export durations, validation rejections and thumbnail failures.
 * Emission is skipped unless METRICS_ENABLED is set and never throws.
 */

import { CloudWatchClient, PutMetricDataCommand, MetricDatum, StandardUnit } from '@aws-sdk/client-cloudwatch';
import { loadEnvironmentConfig } from '../config/environment';
import { log, LogLevel } from './logger';

/**
 * CloudWatch client instance, created on first emission
 */
let cloudWatchClient: CloudWatchClient | null = null;

/**
 * Namespace for custom metrics
 */
const METRIC_NAMESPACE = 'DiamondClips/Pipeline';

/**
 * Metric names
 */
export enum MetricName {
  CLIP_SAVE_DURATION = 'ClipSaveDuration',
  TRIM_EXPORT_DURATION = 'TrimExportDuration',
  THUMBNAIL_GENERATION_FAILURE = 'ThumbnailGenerationFailure',
  VIDEO_VALIDATION_FAILURE = 'VideoValidationFailure',
}

/**
 * Metric units
 */
export const MetricUnit = {
  MILLISECONDS: StandardUnit.Milliseconds,
  COUNT: StandardUnit.Count,
} as const;

export type MetricUnit = (typeof MetricUnit)[keyof typeof MetricUnit];

/**
 * Metric dimensions for filtering and grouping
 */
export interface MetricDimensions {
  operation_type?: string;
  reason?: string;
  origin?: string;
  [key: string]: string | undefined;
}

function getCloudWatchClient(): CloudWatchClient {
  if (!cloudWatchClient) {
    cloudWatchClient = new CloudWatchClient({ region: loadEnvironmentConfig().awsRegion });
  }
  return cloudWatchClient;
}

/**
 * Emit a custom CloudWatch metric
 *
 * @param metricName - Name of the metric
 * @param value - Metric value
 * @param unit - Metric unit (Milliseconds, Count, etc.)
 * @param dimensions - Optional dimensions for filtering
 */
export async function emitMetric(
  metricName: MetricName,
  value: number,
  unit: MetricUnit,
  dimensions?: MetricDimensions
): Promise<void> {
  if (!loadEnvironmentConfig().metricsEnabled) {
    return;
  }

  try {
    const metricData: MetricDatum = {
      MetricName: metricName,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
    };

    // Add dimensions if provided
    if (dimensions) {
      metricData.Dimensions = Object.entries(dimensions).flatMap(([name, dimensionValue]) =>
        dimensionValue === undefined ? [] : [{ Name: name, Value: dimensionValue }]
      );
    }

    const command = new PutMetricDataCommand({
      Namespace: METRIC_NAMESPACE,
      MetricData: [metricData],
    });

    await getCloudWatchClient().send(command);
  } catch (error) {
    // Metrics must not break the pipeline
    log(LogLevel.WARN, 'Failed to emit CloudWatch metric', {
      metric_name: metricName,
      value,
      unit,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

/**
 * Count a video rejected by validation
 */
export async function emitValidationFailure(reason: string): Promise<void> {
  await emitMetric(MetricName.VIDEO_VALIDATION_FAILURE, 1, MetricUnit.COUNT, {
    reason,
    operation_type: 'video_validation',
  });
}

/**
 * Count a thumbnail that could not be generated
 */
export async function emitThumbnailFailure(): Promise<void> {
  await emitMetric(MetricName.THUMBNAIL_GENERATION_FAILURE, 1, MetricUnit.COUNT, {
    operation_type: 'thumbnail_generation',
  });
}

/**
 * Measure and emit duration for an async operation
 *
 * Emits the metric on failure too, with an `error` dimension.
 *
 * @param operation - Async operation to measure
 * @param metricName - Name of the metric to emit
 * @param dimensions - Optional dimensions for the metric
 * @returns Result of the operation
 */
export async function measureDuration<T>(
  operation: () => Promise<T>,
  metricName: MetricName,
  dimensions?: MetricDimensions
): Promise<T> {
  const startTime = Date.now();

  try {
    const result = await operation();
    const duration = Date.now() - startTime;

    await emitMetric(metricName, duration, MetricUnit.MILLISECONDS, dimensions);

    return result;
  } catch (error) {
    const duration = Date.now() - startTime;

    await emitMetric(metricName, duration, MetricUnit.MILLISECONDS, {
      ...dimensions,
      error: 'true',
    });

    throw error;
  }
}

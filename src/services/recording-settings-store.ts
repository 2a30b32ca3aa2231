/**
 * Recording Settings Store
 *
 * File-backed user recording preferences. Constructed explicitly and passed
 * to the capture source; nothing reads it as a global.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  DEFAULT_RECORDING_SETTINGS,
  QUALITY_PRESETS,
  QualityPreset,
  RecordingSettings,
} from '../models/recording';
import { validateRecordingSettings, validateRecordingSettingsPatch } from '../utils/request-validation';
import { log, LogLevel } from '../utils/logger';
import { errorMessage, isFileNotFound } from '../utils/fs-errors';

export class RecordingSettingsStore {
  private settings: RecordingSettings = { ...DEFAULT_RECORDING_SETTINGS };

  constructor(private filePath: string) {}

  /**
   * Read settings from disk
   *
   * A missing file yields the defaults. A corrupt or invalid file is logged
   * and replaced by the defaults in memory.
   */
  async load(): Promise<RecordingSettings> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        this.settings = { ...DEFAULT_RECORDING_SETTINGS };
        return this.get();
      }
      throw error;
    }

    try {
      this.settings = validateRecordingSettings(JSON.parse(raw));
    } catch (error) {
      log(LogLevel.WARN, 'Recording settings file is invalid, using defaults', {
        settings_file: this.filePath,
        error: errorMessage(error),
      });
      this.settings = { ...DEFAULT_RECORDING_SETTINGS };
    }

    return this.get();
  }

  get(): RecordingSettings {
    return { ...this.settings };
  }

  preset(): QualityPreset {
    return QUALITY_PRESETS[this.settings.quality];
  }

  /**
   * Apply a partial update and persist it
   *
   * @throws BadRequestError if the patch is invalid
   */
  async update(patch: unknown): Promise<RecordingSettings> {
    const validPatch = validateRecordingSettingsPatch(patch);
    const next = validateRecordingSettings({ ...this.settings, ...validPatch });

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(next, null, 2), 'utf8');

    this.settings = next;
    return this.get();
  }
}

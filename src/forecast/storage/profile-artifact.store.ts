// src/forecast/storage/profile-artifact.store.ts

/**
 * Profile Artifact Store
 *
 * Reads and writes the lookup artifact as a JSON file. A missing file is not
 * an error (the engine degrades to "no historical data"); a corrupt one is.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { PREDICTION_CONFIG, PredictionConfig } from '../config/prediction.config';
import { ProfileArtifact } from '../types/flow-profile.types';
import { ProfileArtifactValidatorService } from './profile-artifact-validator.service';

export const DEFAULT_ARTIFACT_PATH = 'data/station_profiles.json';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

@Injectable()
export class ProfileArtifactStore {
  private readonly logger = new Logger(ProfileArtifactStore.name);

  constructor(
    private readonly validator: ProfileArtifactValidatorService,
    private readonly configService: ConfigService,
    @Inject(PREDICTION_CONFIG) private readonly config: PredictionConfig,
  ) {}

  get defaultPath(): string {
    return resolve(this.configService.get<string>('PROFILE_ARTIFACT_PATH') || DEFAULT_ARTIFACT_PATH);
  }

  async save(artifact: ProfileArtifact, filePath: string = this.defaultPath): Promise<string> {
    this.validator.assertValid(artifact);

    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify(artifact, null, 2), 'utf-8');

    this.logger.log(`Saved profiles for ${artifact.metadata.totalStations} stations to ${filePath}`);
    return filePath;
  }

  async load(filePath: string = this.defaultPath): Promise<ProfileArtifact | null> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn(`Profile artifact not found: ${filePath}`);
        return null;
      }
      this.logger.error(`Failed to read profile artifact ${filePath}`, error);
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Profile artifact ${filePath} is not valid JSON: ${message}`);
    }

    const result = this.validator.validate(parsed);
    for (const warning of result.warnings) {
      this.logger.warn(`${warning.path}: ${warning.message}`);
    }
    this.validator.assertValid(parsed);

    if (parsed.metadata.timezone !== this.config.timezone) {
      this.logger.warn(
        `Profile artifact was built in ${parsed.metadata.timezone} but forecasts run in ` +
          `${this.config.timezone}; hour slots will not line up`,
      );
    }

    this.logger.log(
      `Loaded profiles for ${Object.keys(parsed.stations).length} stations ` +
        `(${parsed.metadata.dataSource}, ${parsed.metadata.weeksOfData} weeks)`,
    );
    return parsed;
  }
}

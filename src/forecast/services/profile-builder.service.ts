// src/forecast/services/profile-builder.service.ts

/**
 * Profile Builder Service
 *
 * Offline aggregation of historical trips into the station flow lookup
 * artifact. Malformed records are counted and skipped; a station with no
 * valid record is simply absent from the artifact.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { PREDICTION_CONFIG, PredictionConfig } from '../config/prediction.config';
import { AccumulatorOptions, BuildOptions, ProfileAccumulator } from '../engine/profile-accumulator';
import { ProfileArtifact, TripRecord } from '../types/flow-profile.types';

export interface ProfileBuildOptions extends BuildOptions {
  timestampFormats?: readonly string[];
  /** Called every `progressEvery` records with the running total */
  onProgress?: (processed: number) => void;
  progressEvery?: number;
}

@Injectable()
export class ProfileBuilderService {
  private readonly logger = new Logger(ProfileBuilderService.name);

  constructor(@Inject(PREDICTION_CONFIG) private readonly config: PredictionConfig) {}

  createAccumulator(options: Partial<AccumulatorOptions> = {}): ProfileAccumulator {
    return new ProfileAccumulator({
      timezone: options.timezone ?? this.config.timezone,
      timestampFormats: options.timestampFormats,
    });
  }

  /**
   * Build the artifact from any sync or async sequence of trips.
   */
  async build(
    records: Iterable<TripRecord> | AsyncIterable<TripRecord>,
    options: ProfileBuildOptions = {},
  ): Promise<ProfileArtifact> {
    const accumulator = this.createAccumulator({ timestampFormats: options.timestampFormats });
    const progressEvery = options.progressEvery ?? 100_000;

    let processed = 0;
    for await (const record of records) {
      accumulator.add(record);
      processed++;
      if (options.onProgress && processed % progressEvery === 0) {
        options.onProgress(processed);
      }
    }

    return this.finish(accumulator, options);
  }

  /**
   * Turn a filled accumulator into the artifact and log the discard report.
   */
  finish(accumulator: ProfileAccumulator, options: BuildOptions = {}): ProfileArtifact {
    const artifact = accumulator.build(options);
    const { discards } = artifact.metadata;

    this.logger.log(
      `Built profiles for ${artifact.metadata.totalStations} stations from ${discards.accepted} trips ` +
        `over ${artifact.metadata.weeksOfData} weeks`,
    );

    if (discards.discarded > 0) {
      const reasons = Object.entries(discards.byReason)
        .filter(([, count]) => count > 0)
        .map(([reason, count]) => `${reason}=${count}`)
        .join(', ');
      this.logger.warn(`Discarded ${discards.discarded} of ${discards.total} trip records (${reasons})`);
    }

    return artifact;
  }
}

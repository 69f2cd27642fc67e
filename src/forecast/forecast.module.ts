// src/forecast/forecast.module.ts

/**
 * Forecast Module
 *
 * Historical profile builder + availability and trip engine
 */

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PREDICTION_CONFIG, buildPredictionConfig } from './config/prediction.config';
import { AvailabilityClassifier } from './engine/availability-classifier';
import { TripConfidenceEngine } from './engine/trip-confidence-engine';
import { WarningGenerator } from './engine/warning-generator';
import { CommutePlannerService } from './services/commute-planner.service';
import { ForecastService } from './services/forecast.service';
import { LocationContextService } from './services/location-context.service';
import { ProfileBuilderService } from './services/profile-builder.service';
import { TripCsvReaderService } from './services/trip-csv-reader.service';
import { ProfileArtifactValidatorService } from './storage/profile-artifact-validator.service';
import { ProfileArtifactStore } from './storage/profile-artifact.store';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: PREDICTION_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => buildPredictionConfig(configService),
    },
    ProfileBuilderService,
    TripCsvReaderService,
    ProfileArtifactValidatorService,
    ProfileArtifactStore,
    AvailabilityClassifier,
    WarningGenerator,
    TripConfidenceEngine,
    LocationContextService,
    ForecastService,
    CommutePlannerService,
  ],
  exports: [
    PREDICTION_CONFIG,
    ProfileBuilderService,
    TripCsvReaderService,
    ProfileArtifactStore,
    ForecastService,
    LocationContextService,
    CommutePlannerService,
  ],
})
export class ForecastModule {}

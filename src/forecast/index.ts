// src/forecast/index.ts

/**
 * Forecast Module - public exports
 */

export * from './types/flow-profile.types';
export * from './types/station.types';
export * from './types/forecast.types';
export * from './config/prediction.config';
export * from './interfaces/station-feed.interface';
export * from './engine/profile-accumulator';
export * from './engine/profile-lookup';
export * from './engine/availability-classifier';
export * from './engine/warning-generator';
export * from './engine/trip-confidence-engine';
export * from './services/profile-builder.service';
export * from './services/trip-csv-reader.service';
export * from './services/location-context.service';
export * from './services/forecast.service';
export * from './services/commute-planner.service';
export * from './storage/profile-artifact.store';
export * from './storage/profile-artifact-validator.service';
export * from './forecast.module';

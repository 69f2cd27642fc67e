// src/forecast/config/prediction.config.ts

/**
 * Prediction Config
 *
 * Every threshold and weight used by the forecast engine. Injected into the
 * engine through PREDICTION_CONFIG so each rule stays a pure function of
 * (snapshot, profile, time, config).
 */

import { ConfigService } from '@nestjs/config';
import { IANAZone } from 'luxon';

export const PREDICTION_CONFIG = Symbol('PREDICTION_CONFIG');

export interface ClassificationThresholds {
  /** Minimum availability percentage for HIGH */
  highPct: number;
  /** Minimum availability percentage for MEDIUM */
  mediumPct: number;
  /** Availability percentage that is still MEDIUM when the trend is improving */
  improvingPct: number;
  /** HIGH also requires net flow at or above this (bikes/hour) */
  highMinNetFlow: number;
}

export interface WarningThresholds {
  /** Depletion severity must be strictly above this */
  severityThreshold: number;
  /** Look-ahead window in hours */
  horizonHours: number;
  /** Aggregate net flow across the prediction set that signals filling */
  fillAggregateNetFlow: number;
  /** Per-station net flow that signals heavy inflow */
  fillStationNetFlow: number;
}

export interface TripFusionConfig {
  bikeWeight: number;
  dockWeight: number;
  highThreshold: number;
  mediumThreshold: number;
  leaveByBufferMinutes: number;
  leaveByWindowHours: number;
}

export interface PredictionConfig {
  timezone: string;
  predictionSetSize: number;
  displaySetSize: number;
  absoluteBikeFloor: number;
  absoluteDockFloor: number;
  /** Hours before this are "morning": Home -> Work */
  morningCutoffHour: number;
  classification: ClassificationThresholds;
  warnings: WarningThresholds;
  trip: TripFusionConfig;
}

export const DEFAULT_PREDICTION_CONFIG: PredictionConfig = {
  timezone: 'America/Toronto',
  predictionSetSize: 2,
  displaySetSize: 5,
  // ~10% of the fleet is out of service at any time, plus other riders
  absoluteBikeFloor: 5,
  absoluteDockFloor: 5,
  morningCutoffHour: 12,
  classification: {
    highPct: 40,
    mediumPct: 25,
    improvingPct: 15,
    highMinNetFlow: -2,
  },
  warnings: {
    severityThreshold: 15,
    horizonHours: 4,
    fillAggregateNetFlow: 5,
    fillStationNetFlow: 8,
  },
  trip: {
    bikeWeight: 0.6,
    dockWeight: 0.4,
    highThreshold: 2.5,
    mediumThreshold: 1.8,
    leaveByBufferMinutes: 30,
    leaveByWindowHours: 1,
  },
};

function readNumber(configService: ConfigService, key: string, fallback: number): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    return fallback;
  }
  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid prediction config: ${key}=${String(raw)} is not a number`);
  }
  return value;
}

/**
 * Reject combinations that break engine invariants.
 */
export function validatePredictionConfig(config: PredictionConfig): string[] {
  const errors: string[] = [];

  if (!IANAZone.isValidZone(config.timezone)) {
    errors.push(`timezone must be a valid IANA zone, got "${config.timezone}"`);
  }
  if (!Number.isInteger(config.predictionSetSize) || config.predictionSetSize < 1) {
    errors.push('predictionSetSize must be a positive integer');
  }
  if (!Number.isInteger(config.displaySetSize) || config.displaySetSize < 1) {
    errors.push('displaySetSize must be a positive integer');
  }
  if (config.predictionSetSize > config.displaySetSize) {
    errors.push('predictionSetSize must not exceed displaySetSize');
  }
  if (Math.abs(config.trip.bikeWeight + config.trip.dockWeight - 1) > 1e-9) {
    errors.push('trip bike and dock weights must sum to 1');
  }
  if (config.trip.mediumThreshold > config.trip.highThreshold) {
    errors.push('trip medium threshold must not exceed the high threshold');
  }
  const { highPct, mediumPct, improvingPct } = config.classification;
  if (!(improvingPct <= mediumPct && mediumPct <= highPct)) {
    errors.push('classification percentages must satisfy improving <= medium <= high');
  }
  if (config.warnings.horizonHours < 1 || config.warnings.horizonHours > 23) {
    errors.push('warning horizon must be between 1 and 23 hours');
  }
  if (config.morningCutoffHour < 0 || config.morningCutoffHour > 24) {
    errors.push('morningCutoffHour must be between 0 and 24');
  }

  return errors;
}

/**
 * Build the engine config from defaults overlaid with environment values.
 */
export function buildPredictionConfig(configService: ConfigService): PredictionConfig {
  const defaults = DEFAULT_PREDICTION_CONFIG;

  const config: PredictionConfig = {
    timezone: configService.get<string>('FORECAST_TIMEZONE') || defaults.timezone,
    predictionSetSize: readNumber(configService, 'PREDICTION_SET_SIZE', defaults.predictionSetSize),
    displaySetSize: readNumber(configService, 'DISPLAY_SET_SIZE', defaults.displaySetSize),
    absoluteBikeFloor: readNumber(configService, 'ABSOLUTE_BIKE_FLOOR', defaults.absoluteBikeFloor),
    absoluteDockFloor: readNumber(configService, 'ABSOLUTE_DOCK_FLOOR', defaults.absoluteDockFloor),
    morningCutoffHour: readNumber(configService, 'MORNING_CUTOFF_HOUR', defaults.morningCutoffHour),
    classification: {
      highPct: readNumber(configService, 'CLASSIFICATION_HIGH_PCT', defaults.classification.highPct),
      mediumPct: readNumber(configService, 'CLASSIFICATION_MEDIUM_PCT', defaults.classification.mediumPct),
      improvingPct: readNumber(
        configService,
        'CLASSIFICATION_IMPROVING_PCT',
        defaults.classification.improvingPct,
      ),
      highMinNetFlow: readNumber(
        configService,
        'CLASSIFICATION_HIGH_MIN_NET_FLOW',
        defaults.classification.highMinNetFlow,
      ),
    },
    warnings: {
      severityThreshold: readNumber(
        configService,
        'WARNING_SEVERITY_THRESHOLD',
        defaults.warnings.severityThreshold,
      ),
      horizonHours: readNumber(configService, 'WARNING_HORIZON_HOURS', defaults.warnings.horizonHours),
      fillAggregateNetFlow: readNumber(
        configService,
        'FILL_AGGREGATE_NET_FLOW',
        defaults.warnings.fillAggregateNetFlow,
      ),
      fillStationNetFlow: readNumber(configService, 'FILL_STATION_NET_FLOW', defaults.warnings.fillStationNetFlow),
    },
    trip: {
      bikeWeight: readNumber(configService, 'TRIP_BIKE_WEIGHT', defaults.trip.bikeWeight),
      dockWeight: readNumber(configService, 'TRIP_DOCK_WEIGHT', defaults.trip.dockWeight),
      highThreshold: readNumber(configService, 'TRIP_HIGH_THRESHOLD', defaults.trip.highThreshold),
      mediumThreshold: readNumber(configService, 'TRIP_MEDIUM_THRESHOLD', defaults.trip.mediumThreshold),
      leaveByBufferMinutes: readNumber(
        configService,
        'LEAVE_BY_BUFFER_MINUTES',
        defaults.trip.leaveByBufferMinutes,
      ),
      leaveByWindowHours: readNumber(configService, 'LEAVE_BY_WINDOW_HOURS', defaults.trip.leaveByWindowHours),
    },
  };

  const errors = validatePredictionConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid prediction config: ${errors.join('; ')}`);
  }

  return config;
}

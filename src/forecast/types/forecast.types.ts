// src/forecast/types/forecast.types.ts

/**
 * Forecast output types
 *
 * Plain structured records with no formatting or layout information.
 */

import { GeoPoint, NearbyStation } from './station.types';

export type Likelihood = 'HIGH' | 'MEDIUM' | 'LOW';

export const LIKELIHOOD_SCORES: Record<Likelihood, number> = {
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
};

export type WarningKind = 'DEPLETION' | 'FILL';

export interface ForecastWarning {
  kind: WarningKind;
  /** Hour of day (0..23) the risk historically peaks */
  triggerHour: number;
  /** Depletion severity or fill magnitude, window units */
  severity: number;
  /** Hours from the current hour to triggerHour (1..horizon) */
  hoursAhead: number;
  stationId: string;
  stationName: string;
}

export interface ProfileCoverage {
  /** Stations with a flow entry for the current (day, hour) */
  withProfile: string[];
  /** Stations treated as zero net flow */
  withoutProfile: string[];
}

export interface AvailabilityClassification {
  bikeLikelihood: Likelihood;
  dockLikelihood: Likelihood;
  totalBikes: number;
  totalDocks: number;
  totalCapacity: number;
  bikePct: number;
  dockPct: number;
  netFlowBikes: number;
  netFlowDocks: number;
  /** false when the prediction set was empty */
  hasData: boolean;
  coverage: ProfileCoverage;
}

export interface LocationForecast extends AvailabilityClassification {
  depletionWarning?: ForecastWarning;
  fillWarning?: ForecastWarning;
  /** 0..6, Monday = 0 */
  day: number;
  hour: number;
}

export type TripVerdictReason =
  | 'SAFE'
  | 'CONSIDER_ALTERNATIVE'
  | 'DOCKS_TIGHT'
  | 'LEAVE_BY';

export interface TripVerdict {
  confidence: Likelihood;
  reason: TripVerdictReason;
  message: string;
  /** ISO timestamp, present only while inside the visibility window */
  leaveBy?: string;
}

export interface ForecastOutput {
  bikeLikelihood: Likelihood;
  dockLikelihood: Likelihood;
  depletionWarning?: ForecastWarning;
  fillWarning?: ForecastWarning;
  tripVerdict: TripVerdict;
}

export type CommuteEndpoint = 'home' | 'work';

export interface CommuteLocations {
  home?: GeoPoint;
  work?: GeoPoint;
}

export interface CommuteLocationReport {
  reference: GeoPoint;
  nearby: NearbyStation[];
  forecast: LocationForecast;
}

export interface CommuteReport {
  timestamp: string;
  isMorning: boolean;
  direction: {
    from: CommuteEndpoint;
    to: CommuteEndpoint;
  };
  tripSummary: ForecastOutput;
  locations: Record<CommuteEndpoint, CommuteLocationReport>;
  meta: {
    totalStations: number;
    predictionSource: string;
  };
}

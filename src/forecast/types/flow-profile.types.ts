// src/forecast/types/flow-profile.types.ts

/**
 * Flow Profile Types
 *
 * Historical lookup artifact produced offline by the profile builder.
 * Day-of-week is 0..6 with Monday = 0; hour-of-day is 0..23.
 */

export type DayOfWeek = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const DAYS_OF_WEEK: readonly DayOfWeek[] = [0, 1, 2, 3, 4, 5, 6] as const;

export const DAY_NAMES = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export const HOURS_PER_DAY = 24;

/**
 * Raw trip as it comes out of an operator export. Timestamps stay as the
 * export's strings; the builder parses them.
 */
export interface TripRecord {
  readonly originStationId: string;
  readonly destinationStationId: string;
  readonly startTime: string;
  readonly endTime?: string;
}

export interface FlowProfile {
  /** Mean arrivals in this slot per observed week */
  arrivalsPerWeek: number;
  /** Mean departures in this slot per observed week */
  departuresPerWeek: number;
  /** arrivalsPerWeek - departuresPerWeek; positive = station gaining bikes */
  netFlow: number;
}

export interface DepletionSummary {
  /** Earliest hour at which cumulative net flow from midnight is lowest */
  hour: number;
  /** Magnitude of that minimum, in bikes summed over the whole window */
  severity: number;
}

export interface FillSummary {
  /** Earliest hour at which cumulative net flow from midnight is highest */
  hour: number;
  magnitude: number;
}

/** JSON object keys: day -> hour -> slot */
export type StationFlowTable = Record<string, Record<string, FlowProfile>>;

export interface StationProfile {
  flows: StationFlowTable;
  depletion: Record<string, DepletionSummary>;
  fill: Record<string, FillSummary>;
}

export type DiscardReason =
  | 'MISSING_STATION'
  | 'MISSING_START_TIME'
  | 'INVALID_START_TIME'
  | 'INVALID_END_TIME';

export interface DiscardReport {
  total: number;
  accepted: number;
  discarded: number;
  byReason: Record<DiscardReason, number>;
}

export interface ProfileArtifactMetadata {
  generatedAt: string;
  dataSource: string;
  timezone: string;
  weeksOfData: number;
  totalStations: number;
  /** ISO timestamps of the first/last accepted trip, null for an empty build */
  windowStart: string | null;
  windowEnd: string | null;
  discards: DiscardReport;
}

export interface ProfileArtifact {
  metadata: ProfileArtifactMetadata;
  stations: Record<string, StationProfile>;
}

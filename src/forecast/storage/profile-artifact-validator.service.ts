// src/forecast/storage/profile-artifact-validator.service.ts

/**
 * Profile Artifact Validator
 *
 * Structural check of a loaded lookup artifact before the engine reads it.
 */

import { Injectable } from '@nestjs/common';
import { ProfileArtifact } from '../types/flow-profile.types';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isIntegerKeyInRange(key: string, max: number): boolean {
  // lookups read String(n), so "07" would never be found
  return /^\d+$/.test(key) && String(Number(key)) === key && Number(key) <= max;
}

const NET_FLOW_TOLERANCE = 1e-9;

@Injectable()
export class ProfileArtifactValidatorService {
  validate(value: unknown): ValidationResult {
    const errors: ValidationIssue[] = [];
    const warnings: ValidationIssue[] = [];

    if (!isObject(value)) {
      errors.push({ path: '', message: 'artifact must be a JSON object', code: 'INVALID_TYPE' });
      return { valid: false, errors, warnings };
    }

    this.validateMetadata(value.metadata, errors);

    const stations = value.stations;
    if (!isObject(stations)) {
      errors.push({ path: 'stations', message: 'stations is required', code: 'MISSING_FIELD' });
    } else {
      for (const [stationId, station] of Object.entries(stations)) {
        this.validateStation(`stations.${stationId}`, station, errors, warnings);
      }

      if (isObject(value.metadata) && value.metadata.totalStations !== Object.keys(stations).length) {
        warnings.push({
          path: 'metadata.totalStations',
          message: `totalStations does not match the ${Object.keys(stations).length} stations present`,
          code: 'COUNT_MISMATCH',
        });
      }
    }

    return { valid: errors.length === 0, errors, warnings };
  }

  /**
   * Throws with every validation error when the value is not a usable artifact.
   */
  assertValid(value: unknown): asserts value is ProfileArtifact {
    const result = this.validate(value);
    if (!result.valid) {
      const details = result.errors.map(error => `${error.path}: ${error.message}`).join('; ');
      throw new Error(`Invalid profile artifact: ${details}`);
    }
  }

  private validateMetadata(metadata: unknown, errors: ValidationIssue[]): void {
    if (!isObject(metadata)) {
      errors.push({ path: 'metadata', message: 'metadata is required', code: 'MISSING_FIELD' });
      return;
    }

    if (!isFiniteNumber(metadata.weeksOfData) || metadata.weeksOfData <= 0) {
      errors.push({
        path: 'metadata.weeksOfData',
        message: 'weeksOfData must be a positive number',
        code: 'INVALID_VALUE',
      });
    }

    for (const field of ['generatedAt', 'dataSource', 'timezone']) {
      if (typeof metadata[field] !== 'string') {
        errors.push({ path: `metadata.${field}`, message: `${field} must be a string`, code: 'MISSING_FIELD' });
      }
    }
  }

  private validateStation(
    path: string,
    station: unknown,
    errors: ValidationIssue[],
    warnings: ValidationIssue[],
  ): void {
    if (!isObject(station)) {
      errors.push({ path, message: 'station profile must be an object', code: 'INVALID_TYPE' });
      return;
    }

    const { flows, depletion, fill } = station;
    if (!isObject(flows) || !isObject(depletion) || !isObject(fill)) {
      errors.push({ path, message: 'flows, depletion and fill are required', code: 'MISSING_FIELD' });
      return;
    }

    if (Object.keys(flows).length === 0) {
      warnings.push({ path: `${path}.flows`, message: 'station has no flow entries', code: 'EMPTY_PROFILE' });
    }

    for (const [day, hours] of Object.entries(flows)) {
      const dayPath = `${path}.flows.${day}`;
      if (!isIntegerKeyInRange(day, 6) || !isObject(hours)) {
        errors.push({ path: dayPath, message: 'day must be 0..6 with an hour table', code: 'INVALID_KEY' });
        continue;
      }
      for (const [hour, slot] of Object.entries(hours)) {
        this.validateSlot(`${dayPath}.${hour}`, hour, slot, errors);
      }
    }

    this.validateSummaries(`${path}.depletion`, depletion, 'severity', errors);
    this.validateSummaries(`${path}.fill`, fill, 'magnitude', errors);
  }

  private validateSlot(path: string, hour: string, slot: unknown, errors: ValidationIssue[]): void {
    if (!isIntegerKeyInRange(hour, 23)) {
      errors.push({ path, message: 'hour must be 0..23', code: 'INVALID_KEY' });
      return;
    }
    if (
      !isObject(slot) ||
      !isFiniteNumber(slot.arrivalsPerWeek) ||
      !isFiniteNumber(slot.departuresPerWeek) ||
      !isFiniteNumber(slot.netFlow)
    ) {
      errors.push({ path, message: 'slot needs numeric arrivalsPerWeek, departuresPerWeek, netFlow', code: 'INVALID_VALUE' });
      return;
    }
    if (Math.abs(slot.netFlow - (slot.arrivalsPerWeek - slot.departuresPerWeek)) > NET_FLOW_TOLERANCE) {
      errors.push({ path, message: 'netFlow must equal arrivalsPerWeek - departuresPerWeek', code: 'INCONSISTENT_FLOW' });
    }
  }

  private validateSummaries(
    path: string,
    summaries: JsonObject,
    magnitudeField: 'severity' | 'magnitude',
    errors: ValidationIssue[],
  ): void {
    for (const [day, summary] of Object.entries(summaries)) {
      const dayPath = `${path}.${day}`;
      if (!isIntegerKeyInRange(day, 6)) {
        errors.push({ path: dayPath, message: 'day must be 0..6', code: 'INVALID_KEY' });
        continue;
      }
      if (
        !isObject(summary) ||
        !isFiniteNumber(summary.hour) ||
        !Number.isInteger(summary.hour) ||
        summary.hour < 0 ||
        summary.hour > 23
      ) {
        errors.push({ path: dayPath, message: 'hour must be an integer 0..23', code: 'INVALID_VALUE' });
        continue;
      }
      const magnitude = summary[magnitudeField];
      if (!isFiniteNumber(magnitude) || magnitude < 0) {
        errors.push({
          path: dayPath,
          message: `${magnitudeField} must be a non-negative number`,
          code: 'INVALID_VALUE',
        });
      }
    }
  }
}

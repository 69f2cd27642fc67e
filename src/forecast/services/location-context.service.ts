// src/forecast/services/location-context.service.ts

/**
 * Location Context Service
 *
 * Turns live station records into the distance-ordered view around a
 * reference point: a display set (nearest N) and a prediction set (a prefix
 * of it) that drives classification and warnings.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { PREDICTION_CONFIG, PredictionConfig } from '../config/prediction.config';
import { RawStationDto } from '../dto/raw-station.dto';
import { GeoPoint, LocationContext, NearbyStation, StationSnapshot } from '../types/station.types';
import { haversineDistance } from '../utils/geo.util';

@Injectable()
export class LocationContextService {
  private readonly logger = new Logger(LocationContextService.name);

  constructor(@Inject(PREDICTION_CONFIG) private readonly config: PredictionConfig) {}

  /**
   * Validate raw feed records. Invalid records are dropped with a warning.
   */
  normalizeStations(records: readonly Record<string, unknown>[]): StationSnapshot[] {
    const stations: StationSnapshot[] = [];
    let dropped = 0;

    for (const record of records) {
      const dto = plainToInstance(RawStationDto, record);
      const errors = validateSync(dto);
      if (errors.length > 0) {
        dropped++;
        const fields = errors.map(error => error.property).join(', ');
        this.logger.warn(`Dropping station ${String(record.stationId ?? '?')}: invalid ${fields}`);
        continue;
      }

      stations.push({
        stationId: dto.stationId,
        name: dto.name,
        ...(dto.address !== undefined ? { address: dto.address } : {}),
        lat: dto.lat,
        lon: dto.lon,
        capacity: dto.capacity,
        classicBikes: dto.classicBikes,
        ebikes: dto.ebikes,
        docks: dto.docks,
        ...(dto.isCharging !== undefined ? { isCharging: dto.isCharging } : {}),
        inService: dto.inService ?? true,
      });
    }

    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} of ${records.length} station records`);
    }

    return stations;
  }

  buildContext(reference: GeoPoint, stations: readonly StationSnapshot[]): LocationContext {
    const nearby: NearbyStation[] = stations
      .filter(station => station.inService)
      .map(station => ({
        ...station,
        distanceM: haversineDistance(reference, { lat: station.lat, lon: station.lon }),
      }))
      .sort((a, b) => a.distanceM - b.distanceM || a.stationId.localeCompare(b.stationId));

    const displaySet = nearby.slice(0, this.config.displaySetSize);
    const predictionSet = displaySet.slice(0, this.config.predictionSetSize);

    if (nearby.length === 0) {
      this.logger.warn(`No in-service stations near ${reference.lat},${reference.lon}`);
    }

    return { reference, stations: nearby, displaySet, predictionSet };
  }
}

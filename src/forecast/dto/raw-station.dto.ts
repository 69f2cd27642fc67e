// src/forecast/dto/raw-station.dto.ts

import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

/**
 * One station as handed over by the live feed collaborator.
 */
export class RawStationDto {
  @Type(() => String)
  @IsString()
  @IsNotEmpty()
  stationId!: string;

  @IsString()
  name!: string;

  @IsOptional()
  @IsString()
  address?: string;

  @Type(() => Number)
  @IsNumber()
  @Min(-90)
  @Max(90)
  lat!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(-180)
  @Max(180)
  lon!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  capacity!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  classicBikes!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  ebikes!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  docks!: number;

  @IsOptional()
  @IsBoolean()
  isCharging?: boolean;

  /** Defaults to true when the feed does not report a status */
  @IsOptional()
  @IsBoolean()
  inService?: boolean;
}

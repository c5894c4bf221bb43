// src/route-planner/dto/plan-route.dto.ts
import {
  ArrayMinSize,
  buildMessage,
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Min,
  ValidateBy,
  ValidateNested,
  ValidationOptions,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { TransportMode } from '../../network/interfaces/network.interface';
import { PREFERENCE_KEYS, PreferencePreset } from '../../preferences/interfaces/preference.interface';

const PRESETS: PreferencePreset[] = ['fastest', 'fewestTransfers', 'leastCrowded', 'balanced'];

function unknownKeys(value: unknown, allowed: readonly string[]): string[] {
  if (typeof value !== 'object' || value === null) {
    return [];
  }
  return Object.keys(value).filter((key) => !allowed.includes(key));
}

/**
 * Rejects object keys outside `allowed`. Runs before nested validation, so
 * `whitelist` has not stripped them yet.
 */
function HasOnlyKeys(allowed: readonly string[], validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'hasOnlyKeys',
      constraints: [allowed],
      validator: {
        validate: (value: unknown) => unknownKeys(value, allowed).length === 0,
        defaultMessage: buildMessage(
          (eachPrefix, args) => `${eachPrefix}$property has unknown option(s) ${unknownKeys(args?.value, allowed).join(', ')}`,
          validationOptions
        ),
      },
    },
    validationOptions
  );
}

/**
 * Preference weights. Normalized to sum 1; at least one must be positive.
 */
export class PreferencesDto {
  @ApiPropertyOptional({ description: 'Weight of elapsed time', example: 1, minimum: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  minimizeTime?: number;

  @ApiPropertyOptional({ description: 'Weight of the number of transfers', example: 0.5, minimum: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  minimizeTransfers?: number;

  @ApiPropertyOptional({ description: 'Weight of the crowding penalty', example: 0, minimum: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  avoidCrowding?: number;

  @ApiPropertyOptional({
    description: 'In-vehicle time multiplier per mode (default 1)',
    example: { BUS: 1.2 },
  })
  @IsOptional()
  @IsObject()
  modeFactors?: Partial<Record<TransportMode, number>>;
}

export class PlanRouteDto {
  @ApiProperty({ description: 'Origin station id', example: 'RAMSIS' })
  @IsString()
  originId!: string;

  @ApiProperty({ description: 'Destination station id', example: 'AIRPORT' })
  @IsString()
  destinationId!: string;

  @ApiProperty({ description: 'Earliest departure, HH:mm', example: '08:00' })
  @IsString()
  departAfter!: string;

  @ApiPropertyOptional({ type: PreferencesDto })
  @IsOptional()
  @HasOnlyKeys(PREFERENCE_KEYS)
  @ValidateNested()
  @Type(() => PreferencesDto)
  preferences?: PreferencesDto;

  @ApiPropertyOptional({ enum: PRESETS, description: 'Used when preferences are absent', default: 'balanced' })
  @IsOptional()
  @IsIn(PRESETS)
  preset?: PreferencePreset;

  @ApiPropertyOptional({ description: 'Number of itineraries', example: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  k?: number;

  @ApiPropertyOptional({ description: 'Search budget in milliseconds', example: 2000 })
  @IsOptional()
  @IsNumber()
  @Min(1)
  timeoutMs?: number;
}

export class RideRefDto {
  @ApiProperty({ example: 'M1-0800' })
  @IsString()
  tripId!: string;

  @ApiProperty({ description: 'Stop index where the ride starts', example: 0 })
  @IsInt()
  @Min(0)
  boardStopIndex!: number;

  @ApiProperty({ description: 'Stop index where the ride ends', example: 2 })
  @IsInt()
  @Min(1)
  alightStopIndex!: number;
}

/**
 * An itinerary identified by its rides, as returned in RIDE legs.
 */
export class ItineraryRefDto {
  @ApiProperty({ type: [RideRefDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => RideRefDto)
  rides!: RideRefDto[];
}

export class ReserveItineraryDto extends ItineraryRefDto {
  @ApiPropertyOptional({ description: 'Passengers to add or remove', example: 1, default: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  passengers?: number;
}

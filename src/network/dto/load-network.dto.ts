// src/network/dto/load-network.dto.ts
import {
  IsArray,
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { TransportMode } from '../interfaces/network.interface';

export class GeoPointDto {
  @ApiProperty({ description: 'Latitude', example: 48.8566 })
  @IsNumber()
  @Min(-90)
  @Max(90)
  lat!: number;

  @ApiProperty({ description: 'Longitude', example: 2.3522 })
  @IsNumber()
  @Min(-180)
  @Max(180)
  lng!: number;
}

export class StationDto {
  @ApiProperty({ description: 'Stable station identifier', example: 'S1' })
  @IsString()
  @MinLength(1)
  id!: string;

  @ApiPropertyOptional({ description: 'Display name (defaults to the id)', example: 'Central' })
  @IsOptional()
  @IsString()
  name?: string;

  @ApiPropertyOptional({ type: GeoPointDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => GeoPointDto)
  coordinates?: GeoPointDto;

  @ApiProperty({ description: 'Maximum simultaneous occupancy', example: 1000 })
  @IsNumber()
  capacity!: number;

  @ApiPropertyOptional({ description: 'Baseline estimated load', example: 250, default: 0 })
  @IsOptional()
  @IsNumber()
  currentLoad?: number;
}

export class LineDto {
  @ApiProperty({ example: 'M1' })
  @IsString()
  @MinLength(1)
  id!: string;

  @ApiPropertyOptional({ example: 'Metro 1' })
  @IsOptional()
  @IsString()
  name?: string;

  @ApiProperty({ enum: TransportMode, enumName: 'TransportMode', example: TransportMode.METRO })
  @IsEnum(TransportMode, { message: 'mode must be one of METRO, BUS, TRAIN' })
  mode!: TransportMode;

  @ApiProperty({ description: 'Stations in service order', example: ['S1', 'S2', 'S3'], type: [String] })
  @IsArray()
  @IsString({ each: true })
  stationIds!: string[];

  @ApiPropertyOptional({
    description: 'Minutes per segment; defaults to the mode travel time',
    example: [2, 3],
    type: [Number],
  })
  @IsOptional()
  @IsArray()
  @IsNumber({}, { each: true })
  travelTimes?: number[];

  @ApiPropertyOptional({ description: 'Vehicle capacity; defaults by mode', example: 900 })
  @IsOptional()
  @IsInt()
  vehicleCapacity?: number;
}

export class SegmentDto {
  @ApiProperty({ example: 'M1' })
  @IsString()
  lineId!: string;

  @ApiProperty({ example: 'S1' })
  @IsString()
  fromStationId!: string;

  @ApiProperty({ example: 'S2' })
  @IsString()
  toStationId!: string;

  @ApiPropertyOptional({ example: 4 })
  @IsOptional()
  @IsNumber()
  travelTimeMin?: number;

  @ApiPropertyOptional({ example: 600 })
  @IsOptional()
  @IsInt()
  vehicleCapacity?: number;
}

/**
 * Network topology. Semantic checks (unknown stations, duplicates, counts)
 * happen in the network model, which reports every violation at once.
 */
export class LoadNetworkDto {
  @ApiProperty({ type: [StationDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => StationDto)
  stations!: StationDto[];

  @ApiProperty({ type: [LineDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LineDto)
  lines!: LineDto[];

  @ApiPropertyOptional({ type: [SegmentDto], description: 'Per-segment overrides' })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SegmentDto)
  segments?: SegmentDto[];
}

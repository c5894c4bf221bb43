// src/schedule/dto/timetable.dto.ts
import { IsArray, IsIn, IsNumber, IsOptional, IsString, Matches, Min, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { TimetableLoadMode } from '../interfaces/schedule.interface';

const HHMM = /^\d{1,2}:[0-5]\d$/;

export class StopTimeDto {
  @ApiProperty({ example: 'S1' })
  @IsString()
  stationId!: string;

  // `HH:mm` or minutes; checked when the trip is normalized
  @ApiPropertyOptional({ oneOf: [{ type: 'string' }, { type: 'number' }], example: '08:00' })
  @IsOptional()
  arrival?: string | number;

  @ApiPropertyOptional({ oneOf: [{ type: 'string' }, { type: 'number' }], example: '08:01' })
  @IsOptional()
  departure?: string | number;
}

export class TripDto {
  @ApiProperty({ example: 'M1-0800' })
  @IsString()
  id!: string;

  @ApiProperty({ example: 'M1' })
  @IsString()
  lineId!: string;

  @ApiProperty({ type: [StopTimeDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => StopTimeDto)
  stops!: StopTimeDto[];
}

export class HeadwayServiceDto {
  @ApiProperty({ example: 'M1' })
  @IsString()
  lineId!: string;

  @ApiPropertyOptional({ example: '05:00', default: '05:00' })
  @IsOptional()
  @Matches(HHMM, { message: 'firstDeparture must be HH:mm' })
  firstDeparture?: string;

  @ApiPropertyOptional({ example: '23:00', default: '23:00' })
  @IsOptional()
  @Matches(HHMM, { message: 'lastDeparture must be HH:mm' })
  lastDeparture?: string;

  @ApiPropertyOptional({ example: 10, default: 15 })
  @IsOptional()
  @IsNumber()
  headwayMin?: number;

  @ApiPropertyOptional({ example: 1, default: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  dwellMin?: number;
}

export class LoadTimetableDto {
  @ApiProperty({ type: [TripDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TripDto)
  trips!: TripDto[];

  @ApiPropertyOptional({
    enum: ['strict', 'lenient'],
    default: 'strict',
    description: 'strict rejects the whole batch on any bad trip; lenient drops bad trips only',
  })
  @IsOptional()
  @IsIn(['strict', 'lenient'])
  mode?: TimetableLoadMode;
}

export class GenerateServiceDto {
  @ApiProperty({ type: [HeadwayServiceDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => HeadwayServiceDto)
  services!: HeadwayServiceDto[];

  @ApiPropertyOptional({ enum: ['strict', 'lenient'], default: 'strict' })
  @IsOptional()
  @IsIn(['strict', 'lenient'])
  mode?: TimetableLoadMode;
}

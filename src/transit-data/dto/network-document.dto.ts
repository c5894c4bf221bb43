// src/transit-data/dto/network-document.dto.ts
import { IsArray, IsIn, IsOptional, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { LoadNetworkDto } from '../../network/dto/load-network.dto';
import { HeadwayServiceDto, TripDto } from '../../schedule/dto/timetable.dto';
import { TimetableLoadMode } from '../../schedule/interfaces/schedule.interface';

/**
 * Network file format: topology plus optional explicit trips and generated
 * service. Validates both request bodies and files read from disk.
 */
export class NetworkDocumentDto extends LoadNetworkDto {
  @ApiPropertyOptional({ type: [TripDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TripDto)
  trips?: TripDto[];

  @ApiPropertyOptional({ type: [HeadwayServiceDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => HeadwayServiceDto)
  services?: HeadwayServiceDto[];

  @ApiPropertyOptional({ enum: ['strict', 'lenient'], default: 'strict' })
  @IsOptional()
  @IsIn(['strict', 'lenient'])
  timetableMode?: TimetableLoadMode;
}

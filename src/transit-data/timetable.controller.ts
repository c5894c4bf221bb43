// src/transit-data/timetable.controller.ts
import { Body, Controller, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponseDto, ApiSuccessResponseDto } from '../common/dto/api-response.dto';
import { successResponse, transitErrorResponse } from '../common/dto/standard-response.dto';
import { isTransitDataError } from '../common/errors/transit-errors';
import { GenerateServiceDto, LoadTimetableDto } from '../schedule/dto/timetable.dto';
import { TimetableLoadReport } from '../schedule/interfaces/schedule.interface';
import { ScheduleIndex } from '../schedule/schedule-index';
import { TransitDataService } from './transit-data.service';

function summarize(report: TimetableLoadReport<ScheduleIndex>) {
  return {
    scheduleVersion: report.index.version,
    networkVersion: report.index.network.version,
    published: report.published,
    totalTrips: report.index.size,
    rejected: report.rejected.map((r) => ({ tripId: r.tripId, violations: r.error.violations })),
  };
}

@ApiTags('timetable')
@Controller('timetable')
export class TimetableController {
  constructor(private readonly transitData: TransitDataService) {}

  @Post()
  @ApiOperation({
    summary: 'Publish trips',
    description:
      'Adds trips to the current timetable as a new version.\n\n' +
      '- **strict** (default): any bad trip rejects the whole batch\n' +
      '- **lenient**: bad trips are listed under `rejected`, the rest are published',
  })
  @ApiBody({ type: LoadTimetableDto })
  @ApiResponse({ status: 200, type: ApiSuccessResponseDto })
  @ApiResponse({ status: 200, description: 'Batch rejected (strict mode)', type: ApiErrorResponseDto })
  loadTimetable(@Body() dto: LoadTimetableDto) {
    try {
      return successResponse(summarize(this.transitData.loadTimetable(dto.trips, dto.mode)));
    } catch (error) {
      if (isTransitDataError(error)) {
        return transitErrorResponse(error);
      }
      throw error;
    }
  }

  @Post('generate')
  @ApiOperation({
    summary: 'Generate regular-interval service',
    description: 'Builds trips every `headwayMin` minutes from line travel times and publishes them.',
  })
  @ApiBody({ type: GenerateServiceDto })
  @ApiResponse({ status: 200, type: ApiSuccessResponseDto })
  generate(@Body() dto: GenerateServiceDto) {
    try {
      return successResponse(summarize(this.transitData.generateService(dto.services, dto.mode)));
    } catch (error) {
      if (isTransitDataError(error)) {
        return transitErrorResponse(error);
      }
      throw error;
    }
  }
}

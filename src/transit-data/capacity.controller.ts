// src/transit-data/capacity.controller.ts
import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ApiSuccessResponseDto } from '../common/dto/api-response.dto';
import { successResponse, transitErrorResponse } from '../common/dto/standard-response.dto';
import { isTransitDataError } from '../common/errors/transit-errors';
import { TransitDataService } from './transit-data.service';

@ApiTags('capacity')
@Controller('capacity')
export class CapacityController {
  constructor(private readonly transitData: TransitDataService) {}

  @Get()
  @ApiOperation({ summary: 'Estimated load and crowding penalty per station' })
  @ApiResponse({ status: 200, type: ApiSuccessResponseDto })
  getLoads() {
    try {
      const { network, tracker } = this.transitData.current();
      return successResponse({ networkVersion: network.version, stations: tracker.snapshot() });
    } catch (error) {
      if (isTransitDataError(error)) {
        return transitErrorResponse(error);
      }
      throw error;
    }
  }
}

// src/route-planner/route-planner.controller.ts
import { Body, Controller, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponseDto, ApiSuccessResponseDto } from '../common/dto/api-response.dto';
import { successResponse, transitErrorResponse } from '../common/dto/standard-response.dto';
import { isTransitDataError } from '../common/errors/transit-errors';
import { TransitDataService } from '../transit-data/transit-data.service';
import { PlanRouteDto, ReserveItineraryDto } from './dto/plan-route.dto';
import { RoutePlannerService } from './route-planner.service';

@ApiTags('routes')
@Controller('routes')
export class RoutePlannerController {
  constructor(
    private readonly plannerService: RoutePlannerService,
    private readonly transitData: TransitDataService
  ) {}

  @Post('plan')
  @ApiOperation({
    summary: 'Plan up to K itineraries',
    description:
      'Time-dependent multi-criteria search over the current timetable.\n\n' +
      '**Ranking:** cost from the normalized preference weights, then fewer transfers, ' +
      'then earlier arrival.\n\n' +
      '**Results:** an empty list means no service reaches the destination; ' +
      '`truncated` means the deadline or expansion cap stopped the search early.',
  })
  @ApiBody({
    type: PlanRouteDto,
    examples: {
      fastest: {
        summary: 'Fastest route',
        value: { originId: 'RAMSIS', destinationId: 'AIRPORT', departAfter: '08:00', preset: 'fastest' },
      },
      avoidCrowds: {
        summary: 'Custom weights',
        value: {
          originId: 'WEST',
          destinationId: 'AIRPORT',
          departAfter: '08:00',
          preferences: { minimizeTime: 1, minimizeTransfers: 0.5, avoidCrowding: 1 },
          k: 3,
        },
      },
    },
  })
  @ApiResponse({ status: 200, description: 'Itineraries ordered by cost', type: ApiSuccessResponseDto })
  @ApiResponse({ status: 200, description: 'Unknown station or invalid preferences', type: ApiErrorResponseDto })
  async planRoute(@Body() dto: PlanRouteDto) {
    try {
      const result = await this.plannerService.planRoute(this.transitData.current(), dto);
      return successResponse(result);
    } catch (error) {
      if (isTransitDataError(error)) {
        return transitErrorResponse(error);
      }
      throw error;
    }
  }

  @Post('reserve')
  @ApiOperation({
    summary: 'Add expected passengers along an itinerary',
    description: 'Raises the load estimates used by later queries. Reservations are not binding.',
  })
  @ApiBody({ type: ReserveItineraryDto })
  @ApiResponse({ status: 200, type: ApiSuccessResponseDto })
  reserve(@Body() dto: ReserveItineraryDto) {
    return this.adjust(dto, 'reserve');
  }

  @Post('release')
  @ApiOperation({ summary: 'Remove passengers added by an earlier reservation' })
  @ApiBody({ type: ReserveItineraryDto })
  @ApiResponse({ status: 200, type: ApiSuccessResponseDto })
  release(@Body() dto: ReserveItineraryDto) {
    return this.adjust(dto, 'release');
  }

  private adjust(dto: ReserveItineraryDto, action: 'reserve' | 'release') {
    try {
      const data = this.transitData.current();
      const itinerary = this.transitData.resolveItinerary(dto.rides, data);
      const passengers = dto.passengers ?? 1;
      if (action === 'reserve') {
        data.tracker.reserve(itinerary, passengers);
      } else {
        data.tracker.release(itinerary, passengers);
      }
      const stationIds = new Set(
        itinerary.legs.flatMap((leg) => (leg.kind === 'RIDE' ? leg.stationIds : []))
      );
      return successResponse({
        passengers,
        feasible: data.tracker.isFeasible(itinerary),
        stations: data.tracker.snapshot().filter((s) => stationIds.has(s.stationId)),
      });
    } catch (error) {
      if (isTransitDataError(error)) {
        return transitErrorResponse(error);
      }
      throw error;
    }
  }
}

// src/transit-data/network.controller.ts
import { Body, Controller, Get, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponseDto, ApiSuccessResponseDto } from '../common/dto/api-response.dto';
import { successResponse, transitErrorResponse } from '../common/dto/standard-response.dto';
import { isTransitDataError } from '../common/errors/transit-errors';
import { NetworkService } from '../network/network.service';
import { ItineraryRefDto } from '../route-planner/dto/plan-route.dto';
import { NetworkDocumentDto } from './dto/network-document.dto';
import { TransitDataService } from './transit-data.service';

@ApiTags('network')
@Controller('network')
export class NetworkController {
  constructor(
    private readonly transitData: TransitDataService,
    private readonly networkService: NetworkService
  ) {}

  @Post()
  @ApiOperation({
    summary: 'Load a network document',
    description:
      'Publishes a new network version built from stations, lines and segment overrides, ' +
      'plus optional explicit trips and generated headway service.\n\n' +
      'Every inconsistency is reported at once in `error.details.violations`; ' +
      'the previous version stays active when the document is rejected.',
  })
  @ApiBody({ type: NetworkDocumentDto })
  @ApiResponse({ status: 200, description: 'Versions and counts of the published data', type: ApiSuccessResponseDto })
  @ApiResponse({ status: 200, description: 'Document rejected', type: ApiErrorResponseDto })
  loadNetwork(@Body() dto: NetworkDocumentDto) {
    try {
      return successResponse(this.transitData.ingestDocument(dto));
    } catch (error) {
      if (isTransitDataError(error)) {
        return transitErrorResponse(error);
      }
      throw error;
    }
  }

  @Get('snapshot')
  @ApiOperation({ summary: 'Read-only view of the current network for visualization' })
  @ApiResponse({ status: 200, type: ApiSuccessResponseDto })
  getSnapshot() {
    try {
      return successResponse(this.networkService.networkSnapshot(this.transitData.current().network));
    } catch (error) {
      if (isTransitDataError(error)) {
        return transitErrorResponse(error);
      }
      throw error;
    }
  }

  @Post('highlight')
  @ApiOperation({
    summary: 'Stations and segments touched by an itinerary',
    description: 'Takes the rides of a planned itinerary (tripId with board/alight stop indexes).',
  })
  @ApiBody({ type: ItineraryRefDto })
  @ApiResponse({ status: 200, type: ApiSuccessResponseDto })
  highlight(@Body() dto: ItineraryRefDto) {
    try {
      const data = this.transitData.current();
      const itinerary = this.transitData.resolveItinerary(dto.rides, data);
      return successResponse(this.networkService.highlight(data.network, itinerary));
    } catch (error) {
      if (isTransitDataError(error)) {
        return transitErrorResponse(error);
      }
      throw error;
    }
  }
}

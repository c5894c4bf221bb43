// src/common/dto/api-response.dto.ts

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Error payload (Swagger documentation only)
 */
export class ApiErrorDto {
  @ApiProperty({
    enum: ['CONFIGURATION_ERROR', 'SCHEDULE_ERROR', 'INVALID_PREFERENCE'],
    example: 'CONFIGURATION_ERROR',
  })
  code!: string;

  @ApiProperty({ example: 'Network rejected (1 violation(s))' })
  message!: string;

  @ApiPropertyOptional({
    type: Object,
    example: {
      violations: [
        { code: 'UNKNOWN_STATION', message: 'Line M1 references unknown station X', ref: 'M1' },
      ],
    },
  })
  details?: Record<string, unknown>;
}

/**
 * Success envelope (Swagger documentation only)
 */
export class ApiSuccessResponseDto<T> {
  @ApiProperty({ enum: [true], example: true })
  success!: true;

  @ApiProperty()
  data!: T;
}

/**
 * Error envelope (Swagger documentation only)
 */
export class ApiErrorResponseDto {
  @ApiProperty({ enum: [false], example: false })
  success!: false;

  @ApiProperty({ type: ApiErrorDto })
  error!: ApiErrorDto;
}

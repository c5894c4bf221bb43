// src/transit-data/transit-data.module.ts
import { Module } from '@nestjs/common';
import { CapacityModule } from '../capacity/capacity.module';
import { NetworkModule } from '../network/network.module';
import { ScheduleModule } from '../schedule/schedule.module';
import { CapacityController } from './capacity.controller';
import { NetworkController } from './network.controller';
import { TimetableController } from './timetable.controller';
import { TransitDataService } from './transit-data.service';

@Module({
  imports: [NetworkModule, ScheduleModule, CapacityModule],
  controllers: [NetworkController, TimetableController, CapacityController],
  providers: [TransitDataService],
  exports: [TransitDataService],
})
export class TransitDataModule {}

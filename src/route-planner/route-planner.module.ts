// src/route-planner/route-planner.module.ts
import { Module } from '@nestjs/common';
import { PreferencesModule } from '../preferences/preferences.module';
import { TransitDataModule } from '../transit-data/transit-data.module';
import { RoutePlannerController } from './route-planner.controller';
import { RoutePlannerService } from './route-planner.service';

@Module({
  imports: [TransitDataModule, PreferencesModule],
  controllers: [RoutePlannerController],
  providers: [RoutePlannerService],
  exports: [RoutePlannerService],
})
export class RoutePlannerModule {}

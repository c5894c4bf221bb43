// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { transitConfig } from './config/transit.config';
import { NetworkModule } from './network/network.module';
import { ScheduleModule } from './schedule/schedule.module';
import { CapacityModule } from './capacity/capacity.module';
import { PreferencesModule } from './preferences/preferences.module';
import { TransitDataModule } from './transit-data/transit-data.module';
import { RoutePlannerModule } from './route-planner/route-planner.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [transitConfig],
    }),
    NetworkModule, // topology model
    ScheduleModule, // timetable index
    CapacityModule, // load estimates, crowding curve
    PreferencesModule, // weights -> cost function
    TransitDataModule, // current versions, ingestion endpoints
    RoutePlannerModule, // route queries
  ],
})
export class AppModule {}

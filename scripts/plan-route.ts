/**
 * Plan routes on a network document from the command line
 *
 * Usage:
 * npm run plan-route -- --network=data/sample-network.json --from=WEST --to=AIRPORT --depart=08:00
 * npm run plan-route -- --network=data/sample-network.json --from=WEST --to=AIRPORT --depart=08:00 \
 *   --avoid-crowding=1 --minimize-time=1 --k=3 --format=json --export=routes.json
 */

import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { writeFile } from 'fs/promises';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { runRouteCommand } from '../src/cli/route-cli';
import { RoutePlannerService } from '../src/route-planner/route-planner.service';
import { TransitDataService } from '../src/transit-data/transit-data.service';

dotenv.config();

async function main(): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });
  try {
    return await runRouteCommand(process.argv.slice(2), {
      transitData: app.get(TransitDataService),
      planner: app.get(RoutePlannerService),
      io: {
        out: (line) => console.log(line),
        err: (line) => console.error(line),
        writeFile: (filePath, content) => writeFile(filePath, content, 'utf-8'),
      },
    });
  } finally {
    await app.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('❌ plan-route failed:', error instanceof Error ? error.stack ?? error.message : String(error));
    process.exit(1);
  });

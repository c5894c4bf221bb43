// src/main.ts
import 'reflect-metadata'; // must load before any decorated class
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: false,
      transformOptions: {
        enableImplicitConversion: true,
      },
    })
  );

  app.enableCors();

  // ============================================
  // Swagger/OpenAPI
  // ============================================
  const config = new DocumentBuilder()
    .setTitle('Transit Route Planner API')
    .setDescription('Multi-modal route planning over metro, bus and train timetables')
    .setVersion('1.0')
    .addTag('network', 'Network topology loading and visualization data')
    .addTag('timetable', 'Trip publishing and generated service')
    .addTag('routes', 'Route planning and load reservations')
    .addTag('capacity', 'Station load estimates')
    .addServer('http://localhost:3000', 'Local')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document, {
    customSiteTitle: 'Transit Route Planner API',
  });

  const port = process.env.PORT || 3000;
  await app.listen(port);
  logger.log(`Application is running on: http://localhost:${port}`);
  logger.log(`Swagger: http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});

import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureHttpApp } from './app.setup';
import { EnvironmentVariables } from './config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
  });
  configureHttpApp(app);
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Order Fulfillment Engine')
    .setDescription(
      'Turns payment webhooks into paid orders and drives them through enrichment, report generation and delivery.',
    )
    .setVersion('0.1.0')
    .addTag('Ingest', 'Receive payment provider webhooks')
    .addTag('Orders', 'Create orders and query their state')
    .addTag('Affiliates', 'Commission ledger')
    .addTag('Health', 'Liveness and readiness')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService).get('PORT', {
    infer: true,
  });
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(`Fulfillment engine listening on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});

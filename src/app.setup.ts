import { ValidationPipe } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { raw } from 'express';

/**
 * Hard cap for webhook bodies read into memory; the configured
 * `webhooks.maxBodyBytes` is enforced below it by BodySizeGuard
 */
const WEBHOOK_READ_LIMIT = '10mb';

/**
 * HTTP wiring shared by main.ts and the e2e tests. The application must be
 * created with `bodyParser: false` so webhook bodies stay as raw bytes.
 */
export function configureHttpApp(app: NestExpressApplication): NestExpressApplication {
  app.use('/webhooks', raw({ type: () => true, limit: WEBHOOK_READ_LIMIT }));
  app.useBodyParser('json');
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );
  return app;
}

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { FulfillmentModule } from './modules';
import { createFulfillmentConfig, EnvironmentVariables, validateEnvironment } from './config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    FulfillmentModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) =>
        createFulfillmentConfig(config),
    }),
  ],
})
export class AppModule {}

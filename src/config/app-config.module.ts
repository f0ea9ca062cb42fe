import { Global, Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_CONFIG, AppConfig, availableCapabilities, loadAppConfig } from './app-config';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: APP_CONFIG,
      useFactory: (configService: ConfigService): AppConfig => {
        const logger = new Logger('AppConfig');
        const config = loadAppConfig(configService);
        const capabilities = [...availableCapabilities(config)];

        logger.log(
          `[Config] cache=${config.cache.backend} artifacts=${config.artifacts.storage} capabilities=${capabilities.join(',') || 'none'}`,
        );

        return config;
      },
      inject: [ConfigService],
    },
  ],
  exports: [APP_CONFIG],
})
export class AppConfigModule {}

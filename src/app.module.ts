import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { LoggerModule } from 'nestjs-pino';
import { createPinoConfig } from './shared/logging/pino.config';
import { AppConfigModule } from './config/app-config.module';
import { APP_CONFIG, AppConfig } from './config/app-config';
import { QueryCacheModule } from './cache/cache.module';
import { QueryCacheApiModule } from './query-cache/query-cache-api.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    LoggerModule.forRootAsync({
      imports: [AppConfigModule],
      inject: [APP_CONFIG, ConfigService],
      useFactory: (config: AppConfig, configService: ConfigService) =>
        createPinoConfig({
          level: config.server.logLevel,
          serviceName: configService.get<string>('SERVICE_NAME') ?? 'query-cache-service',
          environment: configService.get<string>('NODE_ENV') ?? 'development',
          logDir: configService.get<string>('LOG_DIR'),
        }),
    }),
    ScheduleModule.forRoot(),
    AppConfigModule,
    QueryCacheModule,
    QueryCacheApiModule,
  ],
})
export class AppModule {}

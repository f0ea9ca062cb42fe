import { Module } from '@nestjs/common';
import { PipelinesModule } from '../pipelines/pipelines.module';
import { QueryCacheTcpController } from './query-cache-tcp.controller';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [PipelinesModule],
  controllers: [QueryCacheTcpController, HealthController],
  providers: [HealthService],
})
export class QueryCacheApiModule {}

import { Inject, Injectable } from '@nestjs/common';
import { CACHE_STORE, CacheStore } from '../cache/interfaces/cache-store.interface';
import { ArtifactCacheService } from '../artifacts/artifact-cache.service';
import { APP_CONFIG, AppConfig, Capability, availableCapabilities } from '../config/app-config';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  message?: string;
  cache: {
    configuredBackend: string;
    backend: string;
    reachable: boolean;
  };
  artifacts: {
    backend: string;
  };
  capabilities: Capability[];
}

/**
 * Degraded means requests still succeed but compute on every call
 */
@Injectable()
export class HealthService {
  constructor(
    @Inject(CACHE_STORE) private readonly cacheStore: CacheStore,
    private readonly artifacts: ArtifactCacheService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async check(): Promise<HealthReport> {
    const reachable = (await this.cacheStore.ping()) === 'reachable';
    const report: HealthReport = {
      status: reachable ? 'healthy' : 'degraded',
      cache: {
        configuredBackend: this.config.cache.backend,
        backend: this.cacheStore.backend,
        reachable,
      },
      artifacts: {
        backend: this.artifacts.backend,
      },
      capabilities: [...availableCapabilities(this.config)].sort(),
    };

    if (!reachable) {
      report.message =
        this.config.cache.backend === 'none'
          ? 'Query cache disabled'
          : 'Query cache store unavailable';
    }
    return report;
  }
}

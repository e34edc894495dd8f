import { Injectable, Logger, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common';
import type { Pool } from 'pg';

import { MetricsService } from './metrics.service';
import { AppConfigService } from '../../config/app-config.service';
import { DatabaseService } from '../../database/kysely/database.service';

const COLLECT_INTERVAL_MS = 10_000;

@Injectable()
export class MetricsCollectorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger = new Logger(MetricsCollectorService.name);
  private intervalHandle: ReturnType<typeof setInterval> | null = null;

  public constructor(
    private readonly metricsService: MetricsService,
    private readonly databaseService: DatabaseService,
    private readonly appConfigService: AppConfigService,
  ) {}

  public onModuleInit(): void {
    if (!this.appConfigService.metricsEnabled) {
      this.logger.log('metrics_collection_disabled');
      return;
    }

    this.intervalHandle = setInterval((): void => {
      this.collectPgPoolMetrics();
    }, COLLECT_INTERVAL_MS);

    this.logger.log(`metrics_collector_started intervalMs=${String(COLLECT_INTERVAL_MS)}`);
  }

  public onModuleDestroy(): void {
    if (this.intervalHandle !== null) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
  }

  public collectPgPoolMetrics(): void {
    const pool: Pool = this.databaseService.getPool();

    this.metricsService.pgPoolTotal.set(pool.totalCount);
    this.metricsService.pgPoolIdle.set(pool.idleCount);
    this.metricsService.pgPoolWaiting.set(pool.waitingCount);
  }
}

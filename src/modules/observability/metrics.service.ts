import { Injectable } from '@nestjs/common';
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

import { REMINDER_KINDS } from '../notifications/entities/reminder.interfaces';

// Histogram bucket boundaries in seconds for one scheduler tick
/* eslint-disable no-magic-numbers */
const TICK_DURATION_BUCKETS: number[] = [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30];
/* eslint-enable no-magic-numbers */
const TICK_STATUS_VALUES: readonly string[] = ['ok', 'skipped', 'failed'];
const DELIVERY_STATUS_VALUES: readonly string[] = ['sent', 'failed'];

interface ISchedulerMetrics {
  readonly ticksTotal: Counter;
  readonly tickDurationSeconds: Histogram;
  readonly dueUsers: Gauge;
  readonly candidatesSkippedTotal: Counter;
}

interface IPgPoolMetrics {
  readonly total: Gauge;
  readonly idle: Gauge;
  readonly waiting: Gauge;
}

@Injectable()
export class MetricsService {
  private readonly registry: Registry;

  public readonly reminderTicksTotal: Counter;
  public readonly reminderTickDurationSeconds: Histogram;
  public readonly reminderDueUsers: Gauge;
  public readonly reminderDeliveriesTotal: Counter;
  public readonly reminderCandidatesSkippedTotal: Counter;
  public readonly pgPoolTotal: Gauge;
  public readonly pgPoolIdle: Gauge;
  public readonly pgPoolWaiting: Gauge;

  public constructor() {
    this.registry = new Registry();
    collectDefaultMetrics({ register: this.registry });

    const scheduler: ISchedulerMetrics = this.createSchedulerMetrics();
    this.reminderTicksTotal = scheduler.ticksTotal;
    this.reminderTickDurationSeconds = scheduler.tickDurationSeconds;
    this.reminderDueUsers = scheduler.dueUsers;
    this.reminderCandidatesSkippedTotal = scheduler.candidatesSkippedTotal;

    this.reminderDeliveriesTotal = new Counter({
      name: 'reminder_deliveries_total',
      help: 'Total number of reminder delivery attempts',
      labelNames: ['kind', 'status'] as const,
      registers: [this.registry],
    });

    const pg: IPgPoolMetrics = this.createPgPoolMetrics();
    this.pgPoolTotal = pg.total;
    this.pgPoolIdle = pg.idle;
    this.pgPoolWaiting = pg.waiting;

    this.initializeReminderMetricSeries();
  }

  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }

  private createSchedulerMetrics(): ISchedulerMetrics {
    return {
      ticksTotal: new Counter({
        name: 'reminder_ticks_total',
        help: 'Total number of reminder scheduler ticks',
        labelNames: ['status'] as const,
        registers: [this.registry],
      }),
      tickDurationSeconds: new Histogram({
        name: 'reminder_tick_duration_seconds',
        help: 'Duration of one reminder scheduler tick in seconds',
        buckets: TICK_DURATION_BUCKETS,
        registers: [this.registry],
      }),
      dueUsers: new Gauge({
        name: 'reminder_due_users',
        help: 'Number of users due a reminder in the last processed minute',
        labelNames: ['kind'] as const,
        registers: [this.registry],
      }),
      candidatesSkippedTotal: new Counter({
        name: 'reminder_candidates_skipped_total',
        help: 'Total number of preference rows skipped as malformed',
        registers: [this.registry],
      }),
    };
  }

  private createPgPoolMetrics(): IPgPoolMetrics {
    return {
      total: new Gauge({
        name: 'pg_pool_connections_total',
        help: 'Total number of connections in the pg pool',
        registers: [this.registry],
      }),
      idle: new Gauge({
        name: 'pg_pool_connections_idle',
        help: 'Number of idle connections in the pg pool',
        registers: [this.registry],
      }),
      waiting: new Gauge({
        name: 'pg_pool_connections_waiting',
        help: 'Number of queued requests waiting for a pg connection',
        registers: [this.registry],
      }),
    };
  }

  private initializeReminderMetricSeries(): void {
    for (const status of TICK_STATUS_VALUES) {
      this.reminderTicksTotal.inc({ status }, 0);
    }

    for (const kind of REMINDER_KINDS) {
      this.reminderDueUsers.set({ kind }, 0);

      for (const status of DELIVERY_STATUS_VALUES) {
        this.reminderDeliveriesTotal.inc({ kind, status }, 0);
      }
    }

    this.reminderCandidatesSkippedTotal.inc(0);
  }
}

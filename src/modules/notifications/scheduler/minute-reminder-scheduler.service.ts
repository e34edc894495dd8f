import { Injectable, Logger } from '@nestjs/common';

import type { IReminderScheduler } from './reminder-scheduler.interfaces';
import { ReminderTickService } from '../services/reminder-tick.service';

const MS_PER_MINUTE = 60_000;

/**
 * Fires a reminder tick at every wall-clock minute boundary. The timer is
 * re-armed after each tick so a slow tick shifts nothing but its own minute.
 */
@Injectable()
export class MinuteReminderSchedulerService implements IReminderScheduler {
  private readonly logger: Logger = new Logger(MinuteReminderSchedulerService.name);
  private timeoutHandle: ReturnType<typeof setTimeout> | null = null;
  private activeTick: Promise<void> | null = null;
  private running: boolean = false;

  public constructor(private readonly reminderTickService: ReminderTickService) {}

  public get isRunning(): boolean {
    return this.running;
  }

  public start(): void {
    if (this.running) {
      this.logger.warn('reminder_scheduler_already_running');
      return;
    }

    this.running = true;
    this.scheduleNextTick();
    this.logger.log('reminder_scheduler_started');
  }

  public async shutdown(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;

    if (this.timeoutHandle !== null) {
      clearTimeout(this.timeoutHandle);
      this.timeoutHandle = null;
    }

    if (this.activeTick !== null) {
      await this.activeTick;
    }

    this.logger.log('reminder_scheduler_stopped');
  }

  private scheduleNextTick(): void {
    const delayMs: number = MS_PER_MINUTE - (Date.now() % MS_PER_MINUTE);

    this.timeoutHandle = setTimeout((): void => {
      this.timeoutHandle = null;
      this.activeTick = this.runScheduledTick();
    }, delayMs);
  }

  private async runScheduledTick(): Promise<void> {
    try {
      await this.reminderTickService.runTick(new Date());
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`reminder_scheduler_tick_failed reason=${errorMessage}`);
    } finally {
      this.activeTick = null;

      if (this.running) {
        this.scheduleNextTick();
      }
    }
  }
}

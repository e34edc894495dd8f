/**
 * Periodic driver of the reminder pipeline. The application root calls
 * `start()` once on bootstrap and `shutdown()` once on exit.
 */
export interface IReminderScheduler {
  readonly isRunning: boolean;
  start(): void;
  shutdown(): Promise<void>;
}

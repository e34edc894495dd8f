export enum ReminderTickStatus {
  COMPLETED = 'completed',
  SKIPPED_IN_PROGRESS = 'skipped_in_progress',
  SKIPPED_DUPLICATE_MINUTE = 'skipped_duplicate_minute',
  FAILED = 'failed',
}

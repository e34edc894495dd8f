export interface IReminderDispatchSummary {
  readonly attempted: number;
  readonly sent: number;
  readonly failed: number;
}

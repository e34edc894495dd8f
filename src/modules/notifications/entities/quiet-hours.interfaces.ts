export interface IQuietWindow {
  readonly startMinutes: number;
  readonly endMinutes: number;
}

export interface IQuietHoursEvaluation {
  readonly suppressed: boolean;
  readonly currentMinuteOfDay: number;
  readonly window: IQuietWindow;
}

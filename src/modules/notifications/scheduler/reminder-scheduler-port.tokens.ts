export const REMINDER_SCHEDULER: unique symbol = Symbol('REMINDER_SCHEDULER');

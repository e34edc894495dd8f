export const NOTIFICATION_SENDER: unique symbol = Symbol('NOTIFICATION_SENDER');

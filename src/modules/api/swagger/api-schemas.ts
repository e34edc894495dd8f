import type { SchemaObject } from '@nestjs/swagger/dist/interfaces/open-api-spec.interface';

const MINUTE_OF_DAY_PROPERTY: SchemaObject = {
  type: 'integer',
  minimum: 0,
  maximum: 1439,
  nullable: true,
  description: 'Minutes since local midnight',
};

// -- Notification preferences --

export const NOTIFICATION_PREFERENCES_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    userId: { type: 'string', format: 'uuid' },
    timezone: { type: 'string', example: 'Asia/Ho_Chi_Minh' },
    mealRemindersEnabled: { type: 'boolean' },
    waterRemindersEnabled: { type: 'boolean' },
    sleepRemindersEnabled: { type: 'boolean' },
    progressNotificationsEnabled: { type: 'boolean' },
    breakfastTimeMinutes: { ...MINUTE_OF_DAY_PROPERTY, example: 480 },
    lunchTimeMinutes: { ...MINUTE_OF_DAY_PROPERTY, example: 720 },
    dinnerTimeMinutes: { ...MINUTE_OF_DAY_PROPERTY, example: 1080 },
    sleepReminderTimeMinutes: { ...MINUTE_OF_DAY_PROPERTY, example: 1320 },
    waterReminderTimeMinutes: { ...MINUTE_OF_DAY_PROPERTY, example: 960 },
    dailySummaryTimeMinutes: { ...MINUTE_OF_DAY_PROPERTY, example: 1260 },
    waterReminderIntervalHours: { type: 'integer', minimum: 1, example: 2 },
    lastWaterReminderAt: { type: 'string', format: 'date-time', nullable: true },
    updatedAt: { type: 'string', format: 'date-time' },
  },
  required: [
    'userId',
    'timezone',
    'mealRemindersEnabled',
    'waterRemindersEnabled',
    'sleepRemindersEnabled',
    'progressNotificationsEnabled',
    'waterReminderIntervalHours',
    'updatedAt',
  ],
};

export const UPDATE_NOTIFICATION_PREFERENCES_BODY_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    mealRemindersEnabled: { type: 'boolean' },
    waterRemindersEnabled: { type: 'boolean' },
    sleepRemindersEnabled: { type: 'boolean' },
    progressNotificationsEnabled: { type: 'boolean' },
    breakfastTimeMinutes: MINUTE_OF_DAY_PROPERTY,
    lunchTimeMinutes: MINUTE_OF_DAY_PROPERTY,
    dinnerTimeMinutes: MINUTE_OF_DAY_PROPERTY,
    sleepReminderTimeMinutes: MINUTE_OF_DAY_PROPERTY,
    waterReminderTimeMinutes: MINUTE_OF_DAY_PROPERTY,
    dailySummaryTimeMinutes: MINUTE_OF_DAY_PROPERTY,
    waterReminderIntervalHours: { type: 'integer', minimum: 1 },
    timezone: { type: 'string', description: 'IANA timezone identifier', example: 'Europe/Berlin' },
  },
  additionalProperties: false,
};

// -- Notification history --

const NOTIFICATION_HISTORY_ENTRY_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    id: { type: 'string', example: '42' },
    kind: { type: 'string', example: 'water_reminder' },
    status: { type: 'string', enum: ['sent', 'failed'] },
    failureReason: { type: 'string', nullable: true },
    createdAt: { type: 'string', format: 'date-time' },
  },
  required: ['id', 'kind', 'status', 'failureReason', 'createdAt'],
};

export const NOTIFICATION_HISTORY_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    userId: { type: 'string', format: 'uuid' },
    entries: { type: 'array', items: NOTIFICATION_HISTORY_ENTRY_SCHEMA },
    total: { type: 'integer', minimum: 0 },
    limit: { type: 'integer', minimum: 1, maximum: 100 },
    offset: { type: 'integer', minimum: 0 },
  },
  required: ['userId', 'entries', 'total', 'limit', 'offset'],
};

export const TEST_NOTIFICATION_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    userId: { type: 'string', format: 'uuid' },
    delivered: { type: 'boolean' },
    failureReason: { type: 'string', nullable: true },
    sentAt: { type: 'string', format: 'date-time' },
  },
  required: ['userId', 'delivered', 'failureReason', 'sentAt'],
};

// -- Health --

const COMPONENT_HEALTH_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    ok: { type: 'boolean' },
    details: { type: 'string' },
  },
  required: ['ok', 'details'],
};

export const APP_HEALTH_STATUS_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok', 'degraded'] },
    version: { type: 'string' },
    database: COMPONENT_HEALTH_SCHEMA,
    reminderScheduler: COMPONENT_HEALTH_SCHEMA,
  },
  required: ['status', 'version', 'database', 'reminderScheduler'],
};

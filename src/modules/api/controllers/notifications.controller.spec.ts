import { describe, expect, it, vi } from 'vitest';

import { NotificationsController } from './notifications.controller';
import type { NotificationHistoryService } from '../../notifications/services/notification-history.service';
import type { TestNotificationService } from '../../notifications/services/test-notification.service';
import { notificationHistoryQuerySchema } from '../dto/notification-history-query.dto';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';

type NotificationHistoryServiceStub = {
  readonly getHistory: ReturnType<typeof vi.fn>;
};

type TestNotificationServiceStub = {
  readonly sendTest: ReturnType<typeof vi.fn>;
};

const USER_ID = '3f1c2a9e-5b7d-4e8f-9a1b-2c3d4e5f6a7b';

const createController = (
  historyServiceStub: NotificationHistoryServiceStub,
  testServiceStub: TestNotificationServiceStub,
): NotificationsController =>
  new NotificationsController(
    historyServiceStub as unknown as NotificationHistoryService,
    testServiceStub as unknown as TestNotificationService,
  );

describe('NotificationsController', (): void => {
  it('reads the history page with the parsed query', async (): Promise<void> => {
    const history = { userId: USER_ID, entries: [], total: 0, limit: 50, offset: 0 };
    const historyServiceStub: NotificationHistoryServiceStub = {
      getHistory: vi.fn().mockResolvedValue(history),
    };
    const controller: NotificationsController = createController(historyServiceStub, {
      sendTest: vi.fn(),
    });

    const result = await controller.getHistory(USER_ID, { limit: 50, offset: 0 });

    expect(historyServiceStub.getHistory).toHaveBeenCalledWith(USER_ID, {
      limit: 50,
      offset: 0,
    });
    expect(result).toBe(history);
  });

  it('sends a test notification for the user', async (): Promise<void> => {
    const testResult = {
      userId: USER_ID,
      delivered: true,
      failureReason: null,
      sentAt: '2024-01-15T09:30:00.000Z',
    };
    const testServiceStub: TestNotificationServiceStub = {
      sendTest: vi.fn().mockResolvedValue(testResult),
    };
    const controller: NotificationsController = createController(
      { getHistory: vi.fn() },
      testServiceStub,
    );

    const result = await controller.sendTest(USER_ID);

    expect(testServiceStub.sendTest).toHaveBeenCalledWith(USER_ID);
    expect(result).toBe(testResult);
  });
});

describe('notification history query validation', (): void => {
  const pipe = new ZodValidationPipe(notificationHistoryQuerySchema);

  it('applies paging defaults to an empty query', (): void => {
    expect(pipe.transform({})).toEqual({ limit: 50, offset: 0 });
  });

  it('coerces query strings and accepts the test kind', (): void => {
    expect(pipe.transform({ kind: 'test_notification', limit: '10', offset: '20' })).toEqual({
      kind: 'test_notification',
      limit: 10,
      offset: 20,
    });
  });

  it('rejects a page size above the maximum', (): void => {
    expect((): unknown => pipe.transform({ limit: '500' })).toThrow(/^Validation failed: limit: /);
  });

  it('rejects an unknown kind', (): void => {
    expect((): unknown => pipe.transform({ kind: 'lunch' })).toThrow(/^Validation failed: kind: /);
  });
});

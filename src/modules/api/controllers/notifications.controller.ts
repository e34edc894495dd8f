import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';

import type {
  INotificationHistoryView,
  ITestNotificationResult,
} from '../../notifications/entities/notification-history.interfaces';
import { NotificationHistoryService } from '../../notifications/services/notification-history.service';
import { TestNotificationService } from '../../notifications/services/test-notification.service';
import {
  type NotificationHistoryQueryDto,
  notificationHistoryQuerySchema,
} from '../dto/notification-history-query.dto';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import {
  NOTIFICATION_HISTORY_SCHEMA,
  TEST_NOTIFICATION_RESULT_SCHEMA,
} from '../swagger/api-schemas';

@ApiTags('Notifications')
@Controller('api/notifications')
export class NotificationsController {
  public constructor(
    private readonly notificationHistoryService: NotificationHistoryService,
    private readonly testNotificationService: TestNotificationService,
  ) {}

  @Get(':userId/history')
  @ApiOperation({ summary: 'Get the delivery history of a user, newest first' })
  @ApiParam({ name: 'userId', format: 'uuid' })
  @ApiQuery({ name: 'kind', required: false, type: 'string', description: 'Reminder kind' })
  @ApiQuery({ name: 'limit', required: false, type: 'integer', description: 'Page size (1-100)' })
  @ApiQuery({ name: 'offset', required: false, type: 'integer', description: 'Offset' })
  @ApiResponse({ status: 200, description: 'History page', schema: NOTIFICATION_HISTORY_SCHEMA })
  @ApiResponse({ status: 400, description: 'Invalid query' })
  @ApiResponse({ status: 404, description: 'User not found' })
  public async getHistory(
    @Param('userId', new ParseUUIDPipe()) userId: string,
    @Query(new ZodValidationPipe(notificationHistoryQuerySchema))
    query: NotificationHistoryQueryDto,
  ): Promise<INotificationHistoryView> {
    return this.notificationHistoryService.getHistory(userId, query);
  }

  @Post(':userId/test')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Send a test notification to a user' })
  @ApiParam({ name: 'userId', format: 'uuid' })
  @ApiResponse({
    status: 200,
    description: 'Delivery result',
    schema: TEST_NOTIFICATION_RESULT_SCHEMA,
  })
  @ApiResponse({ status: 404, description: 'User not found' })
  public async sendTest(
    @Param('userId', new ParseUUIDPipe()) userId: string,
  ): Promise<ITestNotificationResult> {
    return this.testNotificationService.sendTest(userId);
  }
}

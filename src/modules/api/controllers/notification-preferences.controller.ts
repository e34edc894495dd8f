import { Body, Controller, Get, Param, ParseUUIDPipe, Patch } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

import type { INotificationPreferencesView } from '../../notifications/entities/notification-preferences.interfaces';
import { NotificationPreferencesService } from '../../notifications/services/notification-preferences.service';
import {
  type UpdateNotificationPreferencesDto,
  updateNotificationPreferencesSchema,
} from '../dto/update-notification-preferences.dto';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import {
  NOTIFICATION_PREFERENCES_SCHEMA,
  UPDATE_NOTIFICATION_PREFERENCES_BODY_SCHEMA,
} from '../swagger/api-schemas';

@ApiTags('Notification preferences')
@Controller('api/notification-preferences')
export class NotificationPreferencesController {
  public constructor(
    private readonly notificationPreferencesService: NotificationPreferencesService,
  ) {}

  @Get(':userId')
  @ApiOperation({ summary: 'Get reminder preferences of a user' })
  @ApiParam({ name: 'userId', format: 'uuid' })
  @ApiResponse({
    status: 200,
    description: 'Reminder preferences',
    schema: NOTIFICATION_PREFERENCES_SCHEMA,
  })
  @ApiResponse({ status: 404, description: 'User not found' })
  public async getPreferences(
    @Param('userId', new ParseUUIDPipe()) userId: string,
  ): Promise<INotificationPreferencesView> {
    return this.notificationPreferencesService.getPreferences(userId);
  }

  @Patch(':userId')
  @ApiOperation({ summary: 'Update reminder preferences of a user' })
  @ApiParam({ name: 'userId', format: 'uuid' })
  @ApiBody({ schema: UPDATE_NOTIFICATION_PREFERENCES_BODY_SCHEMA })
  @ApiResponse({
    status: 200,
    description: 'Updated reminder preferences',
    schema: NOTIFICATION_PREFERENCES_SCHEMA,
  })
  @ApiResponse({ status: 400, description: 'Invalid preference values or timezone' })
  @ApiResponse({ status: 404, description: 'User not found' })
  public async updatePreferences(
    @Param('userId', new ParseUUIDPipe()) userId: string,
    @Body(new ZodValidationPipe(updateNotificationPreferencesSchema))
    body: UpdateNotificationPreferencesDto,
  ): Promise<INotificationPreferencesView> {
    return this.notificationPreferencesService.updatePreferences(userId, body);
  }
}

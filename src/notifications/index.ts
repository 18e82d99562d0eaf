/**
 * Notifications
 */

export {
  DEFAULT_NOTIFICATIONS_CONFIG,
  GROUPING_RULES,
  NotificationService,
  defaultPreference,
  formatGroupMessage,
  isInQuietHours,
  type CreateNotificationRequest,
  type FallbackNotifier,
  type GroupingRule,
  type NotificationListOptions,
  type NotificationServiceDependencies,
} from './notification-service.js';

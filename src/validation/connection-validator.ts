/**
 * Connection Validator
 *
 * Turns untrusted handshake data and inbound WebSocket frames into typed
 * structures. Every entry point returns a fixed-shape result and never throws;
 * downstream handlers only ever see a decoded `InboundFrame`.
 */

import { z } from 'zod';
import { MAX_MESSAGE_LENGTH, characterLength, type UserRef } from '../types/index.js';
import type { StructuredLogger } from '../logger/index.js';
import { NullLogger } from '../logger/index.js';
import { errorFrame } from '../serialization/serializers.js';
import type { ErrorFrame } from '../serialization/frames.js';

export const INBOUND_MESSAGE_TYPES = [
  'message',
  'typing',
  'read_receipt',
  'ping',
  'mark_read',
  'mark_all_read',
  'get_notifications',
  'get_connection_status',
  'bulk_read_receipt',
  'mark_chat_read',
  'force_reconnect',
  'sync_request',
] as const;

export type InboundMessageType = (typeof INBOUND_MESSAGE_TYPES)[number];

export const MAX_BULK_MESSAGE_IDS = 100;
export const DEFAULT_NOTIFICATION_PAGE_SIZE = 20;
export const MAX_NOTIFICATION_PAGE_SIZE = 100;

export type InboundFrame =
  | { type: 'message'; message: string; retryId: string | null; clientId: string | null }
  | { type: 'typing'; isTyping: boolean }
  | { type: 'read_receipt'; messageId: number }
  | { type: 'bulk_read_receipt'; messageIds: number[] }
  | { type: 'mark_chat_read'; messageIds: number[] | null }
  | { type: 'ping'; timestamp: string | null }
  | { type: 'mark_read'; notificationId: number }
  | { type: 'mark_all_read'; notificationType: string | null }
  | {
      type: 'get_notifications';
      limit: number;
      offset: number;
      unreadOnly: boolean;
      notificationType: string | null;
    }
  | { type: 'get_connection_status' }
  | { type: 'force_reconnect' }
  | { type: 'sync_request'; since: Date | null; offset: number };

export interface MessageValidationResult {
  isValid: boolean;
  errors: string[];
  messageType: string | null;
  frame: InboundFrame | null;
}

export type ConnectionRoute = { kind: 'chat'; peerUsername: string } | { kind: 'notifications' };

export interface ConnectionScopeResult {
  isValid: boolean;
  errors: string[];
  user: UserRef | null;
  route: ConnectionRoute | null;
  path: string;
  headers: Record<string, string>;
  queryString: string;
}

type FieldMap = Record<string, unknown>;

const FieldMapSchema = z.record(z.string(), z.unknown());

const UserSchema = z.object({
  id: z.number().int().positive(),
  username: z.string().trim().min(1),
});

const MessageIdListSchema = z
  .array(z.coerce.number().int().positive())
  .min(1)
  .max(MAX_BULK_MESSAGE_IDS);

const CHAT_ROUTE = /^\/ws\/chat\/([\w.@+-]+)\/?$/;
const NOTIFICATIONS_ROUTE = /^\/ws\/notifications\/?$/;

function isInboundType(value: string): value is InboundMessageType {
  return INBOUND_MESSAGE_TYPES.some((type) => type === value);
}

/**
 * Extract a trimmed string; empty strings become null, non-scalars fall back
 */
export function safeGetStringField(
  data: FieldMap,
  field: string,
  defaultValue: string | null = null,
): string | null {
  const value = field in data ? data[field] : defaultValue;
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    const trimmed = String(value).trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return defaultValue;
}

/**
 * Extract an integer from a number or a numeric string
 */
export function safeGetIntegerField(
  data: FieldMap,
  field: string,
  defaultValue: number | null = null,
): number | null {
  const value = field in data ? data[field] : defaultValue;
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : defaultValue;
  }
  if (typeof value === 'string' && /^[+-]?\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return defaultValue;
}

/**
 * Extract a boolean; accepts 'true', '1', 'yes' and 'on' for strings
 */
export function safeGetBooleanField(data: FieldMap, field: string, defaultValue = false): boolean {
  const value = field in data ? data[field] : defaultValue;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
  if (typeof value === 'number') return value !== 0;
  if (value === null) return false;
  return defaultValue;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export class ConnectionValidator {
  constructor(private readonly logger: StructuredLogger = new NullLogger()) {}

  /**
   * Validate an inbound frame that has already been parsed from JSON
   */
  validateMessageData(raw: unknown): MessageValidationResult {
    const parsed = FieldMapSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.debug('Inbound frame is not an object', {
        action: 'frame_validation_failed',
        dataType: Array.isArray(raw) ? 'array' : raw === null ? 'null' : typeof raw,
      });
      return {
        isValid: false,
        errors: ['Message data is not an object'],
        messageType: null,
        frame: null,
      };
    }

    const data = parsed.data;
    const messageType = safeGetStringField(data, 'type', 'message') ?? 'message';

    if (!isInboundType(messageType)) {
      this.logger.debug('Unknown inbound message type', {
        action: 'frame_validation_failed',
        messageType,
      });
      return {
        isValid: false,
        errors: [`Invalid message type: ${messageType}`],
        messageType,
        frame: null,
      };
    }

    const errors: string[] = [];
    const frame = this.decodeFrame(messageType, data, errors);

    return {
      isValid: errors.length === 0,
      errors,
      messageType,
      frame: errors.length === 0 ? frame : null,
    };
  }

  private decodeFrame(type: InboundMessageType, data: FieldMap, errors: string[]): InboundFrame {
    switch (type) {
      case 'message': {
        const content = safeGetStringField(data, 'message');
        if (content === null) {
          errors.push('Message content is required for message type');
        } else if (characterLength(content) > MAX_MESSAGE_LENGTH) {
          errors.push(`Message content exceeds ${String(MAX_MESSAGE_LENGTH)} characters`);
        }
        return {
          type,
          message: content ?? '',
          retryId: safeGetStringField(data, 'retry_id'),
          clientId: safeGetStringField(data, 'client_id'),
        };
      }
      case 'typing':
        return { type, isTyping: safeGetBooleanField(data, 'is_typing', false) };
      case 'read_receipt': {
        const messageId = safeGetIntegerField(data, 'message_id');
        if (messageId === null || messageId <= 0) {
          errors.push('Message ID is required for read receipt');
        }
        return { type, messageId: messageId ?? 0 };
      }
      case 'bulk_read_receipt': {
        const ids = MessageIdListSchema.safeParse(data.message_ids);
        if (!ids.success) {
          errors.push(`message_ids must list 1 to ${String(MAX_BULK_MESSAGE_IDS)} message ids`);
        }
        return { type, messageIds: ids.success ? ids.data : [] };
      }
      case 'mark_chat_read': {
        if (data.message_ids === undefined || data.message_ids === null) {
          return { type, messageIds: null };
        }
        const ids = MessageIdListSchema.safeParse(data.message_ids);
        if (!ids.success) {
          errors.push(`message_ids must list 1 to ${String(MAX_BULK_MESSAGE_IDS)} message ids`);
        }
        return { type, messageIds: ids.success ? ids.data : null };
      }
      case 'ping':
        return { type, timestamp: safeGetStringField(data, 'timestamp') };
      case 'mark_read': {
        const notificationId = safeGetIntegerField(data, 'notification_id');
        if (notificationId === null || notificationId <= 0) {
          errors.push('Notification ID is required for mark_read');
        }
        return { type, notificationId: notificationId ?? 0 };
      }
      case 'mark_all_read':
        return { type, notificationType: safeGetStringField(data, 'notification_type') };
      case 'get_notifications': {
        const limit = safeGetIntegerField(data, 'limit', DEFAULT_NOTIFICATION_PAGE_SIZE);
        const offset = safeGetIntegerField(data, 'offset', 0);
        return {
          type,
          limit: clamp(limit ?? DEFAULT_NOTIFICATION_PAGE_SIZE, 1, MAX_NOTIFICATION_PAGE_SIZE),
          offset: Math.max(0, offset ?? 0),
          unreadOnly: safeGetBooleanField(data, 'unread_only', false),
          notificationType: safeGetStringField(data, 'notification_type'),
        };
      }
      case 'get_connection_status':
        return { type };
      case 'force_reconnect':
        return { type };
      case 'sync_request': {
        const rawSince =
          safeGetStringField(data, 'last_sync_timestamp') ?? safeGetStringField(data, 'timestamp');
        let since: Date | null = null;
        if (rawSince !== null) {
          const parsedDate = new Date(rawSince);
          if (Number.isNaN(parsedDate.getTime())) {
            errors.push('Invalid sync timestamp');
          } else {
            since = parsedDate;
          }
        }
        return { type, since, offset: Math.max(0, safeGetIntegerField(data, 'offset', 0) ?? 0) };
      }
    }
  }

  /**
   * Validate handshake data: the resolved principal and the requested path
   */
  validateConnectionScope(scope: unknown): ConnectionScopeResult {
    const result: ConnectionScopeResult = {
      isValid: true,
      errors: [],
      user: null,
      route: null,
      path: '',
      headers: {},
      queryString: '',
    };

    const parsed = FieldMapSchema.safeParse(scope);
    if (!parsed.success) {
      result.isValid = false;
      result.errors.push('Scope is not an object');
      return result;
    }
    const data = parsed.data;

    const user = UserSchema.safeParse(data.user);
    if (user.success) {
      result.user = user.data;
    } else {
      result.isValid = false;
      result.errors.push('No authenticated user found');
    }

    const rawPath = safeGetStringField(data, 'path') ?? '';
    const [pathname = '', query = ''] = rawPath.split('?', 2);
    result.path = pathname;
    result.queryString = query;

    const chat = CHAT_ROUTE.exec(pathname);
    if (chat?.[1]) {
      result.route = { kind: 'chat', peerUsername: chat[1] };
    } else if (NOTIFICATIONS_ROUTE.test(pathname)) {
      result.route = { kind: 'notifications' };
    } else {
      result.isValid = false;
      result.errors.push(`Unknown route: ${pathname || '/'}`);
    }

    const headers = FieldMapSchema.safeParse(data.headers);
    if (headers.success) {
      for (const [key, value] of Object.entries(headers.data)) {
        if (typeof value === 'string') {
          result.headers[key.toLowerCase()] = value;
        } else if (Array.isArray(value)) {
          result.headers[key.toLowerCase()] = value.filter((v) => typeof v === 'string').join(', ');
        }
      }
    }

    if (!result.isValid) {
      this.logger.debug('Connection scope rejected', {
        action: 'scope_validation_failed',
        errors: result.errors,
      });
    }

    return result;
  }

  /**
   * Build the error frame sent back for a rejected frame
   */
  generateErrorResponse(errors: string[]): ErrorFrame {
    return errorFrame(errors.length > 0 ? errors.join('; ') : 'Unknown error occurred', { errors });
  }
}

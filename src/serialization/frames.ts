/**
 * Outbound frame schemas
 *
 * Frames are the snake_case JSON objects written to WebSocket clients. Frames
 * that travel through the channel layer are described with zod so a layer that
 * crosses a process boundary (Redis pub/sub) can decode them back into typed
 * events.
 */

import { z } from 'zod';

const IsoDate = z.string().describe('ISO-8601 timestamp');

export const MessageFrameSchema = z.object({
  type: z.literal('message'),
  id: z.number().int(),
  sender: z.string(),
  sender_id: z.number().int(),
  recipient: z.string(),
  recipient_id: z.number().int(),
  content: z.string(),
  client_id: z.string().nullable(),
  status: z.enum(['pending', 'sent', 'delivered', 'read', 'failed']),
  status_icon: z.string(),
  created_at: IsoDate,
  is_read: z.boolean(),
  read_at: IsoDate.nullable(),
  delivered_at: IsoDate.nullable(),
  retry_id: z.string().nullable().optional(),
  sequence_id: z.number().int().optional(),
});

export const TypingFrameSchema = z.object({
  type: z.literal('typing'),
  user_id: z.number().int(),
  username: z.string(),
  is_typing: z.boolean(),
  timestamp: IsoDate,
});

export const ReadReceiptFrameSchema = z.object({
  type: z.literal('read_receipt'),
  message_id: z.number().int(),
  client_id: z.string().nullable(),
  read_by: z.string(),
  read_by_id: z.number().int(),
  read_at: IsoDate,
  status: z.literal('read'),
  status_icon: z.string(),
});

export const BulkReadReceiptFrameSchema = z.object({
  type: z.literal('bulk_read_receipt'),
  message_ids: z.array(z.number().int()),
  read_by: z.string(),
  read_by_id: z.number().int(),
  read_at: IsoDate,
  count: z.number().int(),
});

export const UserStatusFrameSchema = z.object({
  type: z.literal('user_status'),
  user_id: z.number().int(),
  username: z.string(),
  is_online: z.boolean(),
  last_seen: IsoDate.nullable(),
  timestamp: IsoDate,
});

export const NotificationFrameSchema = z.object({
  type: z.literal('notification'),
  id: z.number().int(),
  notification_type: z.string(),
  title: z.string(),
  message: z.string(),
  priority: z.enum(['low', 'normal', 'high', 'urgent']),
  sender: z.string().nullable(),
  created_at: IsoDate,
  action_url: z.string().nullable(),
  is_grouped: z.boolean(),
  group_count: z.number().int(),
  unread_count: z.number().int(),
});

export const BadgeUpdateFrameSchema = z.object({
  type: z.literal('badge_update'),
  unread_count: z.number().int(),
  timestamp: IsoDate,
});

export const ConnectionStatusFrameSchema = z.object({
  type: z.literal('connection_status'),
  connection_id: z.string(),
  state: z.string(),
  previous_state: z.string().nullable(),
  retry_count: z.number().int(),
  next_retry_at: IsoDate.nullable(),
  error_message: z.string().nullable(),
  timestamp: IsoDate,
});

/**
 * Events exchanged between sessions through the channel layer
 */
export const ChannelEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('chat_message'), payload: MessageFrameSchema }),
  z.object({ type: z.literal('typing_indicator'), payload: TypingFrameSchema }),
  z.object({ type: z.literal('read_receipt'), payload: ReadReceiptFrameSchema }),
  z.object({ type: z.literal('bulk_read_receipt'), payload: BulkReadReceiptFrameSchema }),
  z.object({ type: z.literal('user_status'), payload: UserStatusFrameSchema }),
  z.object({ type: z.literal('notification_message'), payload: NotificationFrameSchema }),
  z.object({ type: z.literal('badge_update'), payload: BadgeUpdateFrameSchema }),
  z.object({ type: z.literal('connection_status'), payload: ConnectionStatusFrameSchema }),
]);

export type MessageFrame = z.infer<typeof MessageFrameSchema>;
export type TypingFrame = z.infer<typeof TypingFrameSchema>;
export type ReadReceiptFrame = z.infer<typeof ReadReceiptFrameSchema>;
export type BulkReadReceiptFrame = z.infer<typeof BulkReadReceiptFrameSchema>;
export type UserStatusFrame = z.infer<typeof UserStatusFrameSchema>;
export type NotificationFrame = z.infer<typeof NotificationFrameSchema>;
export type BadgeUpdateFrame = z.infer<typeof BadgeUpdateFrameSchema>;
export type ConnectionStatusFrame = z.infer<typeof ConnectionStatusFrameSchema>;
export type ChannelEvent = z.infer<typeof ChannelEventSchema>;
export type ChannelEventType = ChannelEvent['type'];

// Frames written directly to a single socket

export interface ErrorFrame {
  type: 'error';
  error: string;
  timestamp: string;
  retry_id?: string | null;
  retry_after?: number;
  suggested_actions?: string[];
  error_id?: string;
  errors?: string[];
}

export interface PongFrame {
  type: 'pong';
  timestamp: string;
}

export interface MessageQueuedFrame {
  type: 'message_queued';
  retry_id: string | null;
  queued_id: number | null;
  message: string;
  timestamp: string;
}

export interface ReadReceiptResultFrame {
  type: 'bulk_read_receipt_result' | 'mark_chat_read_result';
  processed_count: number;
  failed_count: number;
  already_read_count: number;
  message_ids: number[];
  timestamp: string;
}

export interface QueuedMessageFrame {
  type: 'queued_message';
  queued_id: number;
  sender: string;
  recipient: string;
  content: string;
  client_id: string | null;
  queue_type: 'outgoing' | 'incoming' | 'retry';
  retry_count: number;
  created_at: string;
}

export type SyncMessageEntry =
  | { sync_type: 'incoming_message'; sync_priority: 1; sort_timestamp: string; message: MessageFrame }
  | { sync_type: 'outgoing_message'; sync_priority: 2; sort_timestamp: string; message: QueuedMessageFrame }
  | { sync_type: 'status_update'; sync_priority: 3; sort_timestamp: string; message: MessageFrame };

export interface SyncResponseFrame {
  type: 'sync_response';
  connection_id: string;
  user_id: number;
  sync_timestamp: string;
  incoming_count: number;
  outgoing_count: number;
  status_update_count: number;
  total_messages: number;
  messages: SyncMessageEntry[];
  /** Also true when the backlog exceeded the fetch limit; sync again from the last entry */
  has_more: boolean;
  next_batch_offset: number | null;
}

export type NotificationListItem = Omit<NotificationFrame, 'type' | 'unread_count'> & {
  is_read: boolean;
  read_at: string | null;
};

export interface NotificationsListFrame {
  type: 'notifications_list';
  notifications: NotificationListItem[];
  limit: number;
  offset: number;
  unread_count: number;
}

export interface MarkReadResponseFrame {
  type: 'mark_read_response';
  notification_id: number;
  success: boolean;
}

export interface MarkAllReadResponseFrame {
  type: 'mark_all_read_response';
  marked_count: number;
}

/**
 * Any frame a session may write to its socket
 */
export type OutboundFrame =
  | ErrorFrame
  | PongFrame
  | MessageQueuedFrame
  | ReadReceiptResultFrame
  | SyncResponseFrame
  | NotificationsListFrame
  | MarkReadResponseFrame
  | MarkAllReadResponseFrame
  | UserStatusFrame
  | BadgeUpdateFrame
  | ConnectionStatusFrame
  | MessageFrame
  | TypingFrame
  | ReadReceiptFrame
  | BulkReadReceiptFrame
  | NotificationFrame;

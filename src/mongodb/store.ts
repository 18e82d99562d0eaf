/**
 * MongoDB Messaging Store
 *
 * Durable `MessagingStore` on the official driver
 * - Numeric ids allocated from a `counters` collection
 * - Connection counters change through conditional atomic updates
 * - A unique (sender, clientId) index backs message deduplication
 */

import {
  MongoClient,
  MongoServerError,
  type Collection,
  type Db,
  type Document,
  type Filter,
  type WithId,
} from 'mongodb';
import type {
  CreateErrorRecordInput,
  CreateMessageInput,
  CreateMessageResult,
  CreateNotificationInput,
  CreateQueuedMessageInput,
  Message,
  MessageStatus,
  MessagingErrorRecord,
  MessagingStore,
  Notification,
  NotificationPatch,
  NotificationPreference,
  NotificationPreferenceInput,
  NotificationQuery,
  NotificationType,
  PendingQueuedLookup,
  QueueCounts,
  QueuedMessage,
  QueuedMessagePatch,
  QueueType,
  StatusTransitionResult,
  StructuredLogger,
  TypingStatus,
  TypingUpdateResult,
  UserId,
  UserRef,
  UserStatus,
  UserStatusQuery,
} from '../types/index.js';
import { NullLogger, StorageError, toError } from '../types/index.js';
import { applyStatusTransition } from '../storage/index.js';
import { storeLatencyHistogram } from '../metrics/index.js';

export interface MongoMessagingStoreConfig {
  mongoUrl: string;
  databaseName: string;
  enableTls?: boolean;
  logger?: StructuredLogger;
}

type NumericDoc<T extends { id: number }> = Omit<T, 'id'> & { _id: number };

type MessageDoc = NumericDoc<Message>;
type QueuedMessageDoc = NumericDoc<QueuedMessage>;
type NotificationDoc = NumericDoc<Notification>;
type ErrorRecordDoc = NumericDoc<MessagingErrorRecord>;
type UserDoc = NumericDoc<UserRef>;
type UserStatusDoc = UserStatus & { _id: UserId };
type TypingStatusDoc = TypingStatus & { _id: string };
type PreferenceDoc = NotificationPreference & { _id: string };

interface CounterDoc {
  _id: string;
  seq: number;
}

interface Collections {
  messages: Collection<MessageDoc>;
  queued: Collection<QueuedMessageDoc>;
  notifications: Collection<NotificationDoc>;
  preferences: Collection<PreferenceDoc>;
  statuses: Collection<UserStatusDoc>;
  typing: Collection<TypingStatusDoc>;
  errors: Collection<ErrorRecordDoc>;
  users: Collection<UserDoc>;
  counters: Collection<CounterDoc>;
}

const DUPLICATE_KEY = 11000;

function toEntity<T extends { _id: number }>(doc: T): Omit<T, '_id'> & { id: number } {
  const { _id, ...rest } = doc;
  return { ...rest, id: _id };
}

function stripId<T extends { _id: unknown }>(doc: T): Omit<T, '_id'> {
  const { _id, ...rest } = doc;
  return rest;
}

function typingKey(userId: UserId, partnerId: UserId): string {
  return `${String(userId)}:${String(partnerId)}`;
}

function preferenceKey(userId: UserId, type: NotificationType): string {
  return `${String(userId)}:${type}`;
}

/**
 * MongoMessagingStore - MessagingStore implementation using MongoDB
 */
export class MongoMessagingStore implements MessagingStore {
  private client: MongoClient;
  private db: Db | null = null;
  private collections: Collections | null = null;
  private config: MongoMessagingStoreConfig;
  private logger: StructuredLogger;
  private connected = false;

  constructor(config: MongoMessagingStoreConfig) {
    this.config = config;
    this.logger = config.logger ?? new NullLogger();

    this.client = new MongoClient(config.mongoUrl, {
      maxPoolSize: 10,
      minPoolSize: 2,
      maxIdleTimeMS: 30000,
      serverSelectionTimeoutMS: 5000,
      ignoreUndefined: true,
      tls: config.enableTls,
    });

    this.client.on('error', (err: Error) => {
      this.logger.error('MongoDB client error', err, { action: 'mongo_client_error' });
    });

    this.client.on('close', () => {
      this.logger.warn('MongoDB client closed', { action: 'mongo_client_closed' });
      this.connected = false;
    });
  }

  /**
   * Connect to MongoDB and create indexes
   */
  async connect(): Promise<void> {
    if (this.connected) return;

    try {
      await this.client.connect();
      const db = this.client.db(this.config.databaseName);
      this.db = db;
      this.collections = {
        messages: db.collection<MessageDoc>('messages'),
        queued: db.collection<QueuedMessageDoc>('queued_messages'),
        notifications: db.collection<NotificationDoc>('notifications'),
        preferences: db.collection<PreferenceDoc>('notification_preferences'),
        statuses: db.collection<UserStatusDoc>('user_statuses'),
        typing: db.collection<TypingStatusDoc>('typing_statuses'),
        errors: db.collection<ErrorRecordDoc>('messaging_errors'),
        users: db.collection<UserDoc>('users'),
        counters: db.collection<CounterDoc>('counters'),
      };

      await this.createIndexes(this.collections);
      this.connected = true;
      this.logger.info('MongoMessagingStore connected', {
        database: this.config.databaseName,
        action: 'mongo_connect_success',
      });
    } catch (error) {
      throw new StorageError('Failed to connect to MongoDB', 'mongo', toError(error));
    }
  }

  /**
   * Disconnect from MongoDB
   */
  async disconnect(): Promise<void> {
    if (!this.connected) return;

    try {
      await this.client.close();
      this.connected = false;
      this.collections = null;
      this.db = null;
    } catch (error) {
      this.logger.error('Error disconnecting from MongoDB', error, { action: 'mongo_disconnect_error' });
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  private async createIndexes(c: Collections): Promise<void> {
    const indexOps = [
      c.messages.createIndex(
        { 'sender.id': 1, clientId: 1 },
        {
          name: 'sender_client_id_unique',
          unique: true,
          partialFilterExpression: { clientId: { $type: 'string' } },
        },
      ),
      c.messages.createIndex({ 'recipient.id': 1, createdAt: 1 }, { name: 'recipient_created_idx' }),
      c.messages.createIndex({ 'sender.id': 1, 'recipient.id': 1, createdAt: -1 }, { name: 'pair_idx' }),
      c.queued.createIndex(
        { 'recipient.id': 1, isProcessed: 1, priority: 1, createdAt: 1 },
        { name: 'deliverable_idx' },
      ),
      c.queued.createIndex({ isProcessed: 1, nextRetryAt: 1 }, { name: 'retry_idx' }),
      c.queued.createIndex({ expiresAt: 1 }, { name: 'expires_idx' }),
      c.notifications.createIndex({ 'recipient.id': 1, createdAt: -1 }, { name: 'recipient_idx' }),
      c.notifications.createIndex({ 'recipient.id': 1, groupKey: 1 }, { name: 'group_idx' }),
      c.statuses.createIndex({ isOnline: 1, lastPing: -1 }, { name: 'online_idx' }),
      c.users.createIndex({ username: 1 }, { name: 'username_unique', unique: true }),
    ];

    const results = await Promise.allSettled(indexOps);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn('Error creating indexes (may already exist)', {
          error: toError(result.reason).message,
          action: 'mongo_indexes_error',
        });
      }
    }
  }

  private ensureConnected(): Collections {
    if (!this.connected || !this.collections) {
      throw new StorageError('MongoMessagingStore not connected', 'mongo');
    }
    return this.collections;
  }

  private async execute<T>(operation: string, fn: (c: Collections) => Promise<T>): Promise<T> {
    const endTimer = storeLatencyHistogram.startTimer({ operation });
    try {
      const result = await fn(this.ensureConnected());
      endTimer({ status: 'success' });
      return result;
    } catch (error) {
      endTimer({ status: 'error' });
      if (error instanceof StorageError) throw error;
      throw new StorageError(`MongoDB ${operation} failed`, 'mongo', toError(error));
    }
  }

  private async nextId(c: Collections, sequence: string): Promise<number> {
    const counter = await c.counters.findOneAndUpdate(
      { _id: sequence },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: 'after' },
    );
    if (!counter) {
      throw new StorageError(`Counter ${sequence} unavailable`, 'mongo');
    }
    return counter.seq;
  }

  // Users

  saveUser(user: UserRef): Promise<UserRef> {
    return this.execute('saveUser', async (c) => {
      await c.users.replaceOne({ _id: user.id }, { username: user.username }, { upsert: true });
      return { ...user };
    });
  }

  getUser(id: UserId): Promise<UserRef | null> {
    return this.execute('getUser', async (c) => {
      const doc = await c.users.findOne({ _id: id });
      return doc ? toEntity(doc) : null;
    });
  }

  findUserByUsername(username: string): Promise<UserRef | null> {
    return this.execute('findUserByUsername', async (c) => {
      const doc = await c.users.findOne({ username });
      return doc ? toEntity(doc) : null;
    });
  }

  // Messages

  createMessage(input: CreateMessageInput): Promise<CreateMessageResult> {
    return this.execute('createMessage', async (c) => {
      const clientId = input.clientId ?? null;
      if (clientId !== null) {
        const existing = await c.messages.findOne({ 'sender.id': input.sender.id, clientId });
        if (existing) return { message: toEntity(existing), created: false };
      }

      const at = input.at ?? new Date();
      const status: MessageStatus = input.status ?? 'sent';
      const doc: MessageDoc = {
        _id: await this.nextId(c, 'messages'),
        sender: input.sender,
        recipient: input.recipient,
        content: input.content,
        clientId,
        status,
        isRead: status === 'read',
        createdAt: at,
        sentAt: status === 'pending' ? null : at,
        deliveredAt: status === 'delivered' || status === 'read' ? at : null,
        readAt: status === 'read' ? at : null,
        failedAt: null,
        retryCount: 0,
        lastError: null,
      };

      try {
        await c.messages.insertOne(doc);
        return { message: toEntity(doc), created: true };
      } catch (error) {
        if (error instanceof MongoServerError && error.code === DUPLICATE_KEY && clientId !== null) {
          const winner = await c.messages.findOne({ 'sender.id': input.sender.id, clientId });
          if (winner) return { message: toEntity(winner), created: false };
        }
        throw error;
      }
    });
  }

  getMessage(id: number): Promise<Message | null> {
    return this.execute('getMessage', async (c) => {
      const doc = await c.messages.findOne({ _id: id });
      return doc ? toEntity(doc) : null;
    });
  }

  getConversation(userA: UserId, userB: UserId, limit: number): Promise<Message[]> {
    return this.execute('getConversation', async (c) => {
      const docs = await c.messages
        .find({
          $or: [
            { 'sender.id': userA, 'recipient.id': userB },
            { 'sender.id': userB, 'recipient.id': userA },
          ],
        })
        .sort({ createdAt: -1, _id: -1 })
        .limit(limit)
        .toArray();
      return docs.reverse().map(toEntity);
    });
  }

  getMessagesForRecipient(recipientId: UserId, since: Date, limit: number): Promise<Message[]> {
    return this.execute('getMessagesForRecipient', async (c) => {
      const docs = await c.messages
        .find({ 'recipient.id': recipientId, createdAt: { $gte: since } })
        .sort({ createdAt: 1, _id: 1 })
        .limit(limit)
        .toArray();
      return docs.map(toEntity);
    });
  }

  getStatusUpdatesForSender(senderId: UserId, since: Date, limit: number): Promise<Message[]> {
    return this.execute('getStatusUpdatesForSender', async (c) => {
      const docs = await c.messages
        .find({
          'sender.id': senderId,
          $or: [{ deliveredAt: { $gte: since } }, { readAt: { $gte: since } }],
        })
        .sort({ createdAt: 1, _id: 1 })
        .limit(limit)
        .toArray();
      return docs.map(toEntity);
    });
  }

  getUnreadMessageIds(recipientId: UserId, senderId: UserId): Promise<number[]> {
    return this.execute('getUnreadMessageIds', async (c) => {
      const docs = await c.messages
        .find({ 'recipient.id': recipientId, 'sender.id': senderId, isRead: false })
        .sort({ createdAt: 1, _id: 1 })
        .project<{ _id: number }>({ _id: 1 })
        .toArray();
      return docs.map((doc) => doc._id);
    });
  }

  transitionMessageStatus(
    id: number,
    status: MessageStatus,
    at: Date,
    error?: string,
  ): Promise<StatusTransitionResult | null> {
    return this.execute('transitionMessageStatus', async (c) => {
      const doc = await c.messages.findOne({ _id: id });
      if (!doc) return null;

      const current: Message = toEntity(doc);
      const next = applyStatusTransition(current, status, at, error);
      if (!next) return { message: current, changed: false };

      // Guarded on the previous status so a concurrent transition wins once
      const result = await c.messages.updateOne(
        { _id: id, status: current.status },
        {
          $set: {
            status: next.status,
            isRead: next.isRead,
            sentAt: next.sentAt,
            deliveredAt: next.deliveredAt,
            readAt: next.readAt,
            failedAt: next.failedAt,
            lastError: next.lastError,
            retryCount: next.retryCount,
          },
        },
      );
      if (result.modifiedCount === 0) {
        const latest = await c.messages.findOne({ _id: id });
        return { message: latest ? toEntity(latest) : current, changed: false };
      }
      return { message: next, changed: true };
    });
  }

  async markMessageRead(id: number, readAt: Date): Promise<boolean> {
    const result = await this.transitionMessageStatus(id, 'read', readAt);
    return result?.changed ?? false;
  }

  async markMessageDelivered(id: number, deliveredAt: Date): Promise<boolean> {
    const result = await this.transitionMessageStatus(id, 'delivered', deliveredAt);
    return result?.changed ?? false;
  }

  // Offline queue

  createQueuedMessage(input: CreateQueuedMessageInput): Promise<QueuedMessage> {
    return this.execute('createQueuedMessage', async (c) => {
      const doc: QueuedMessageDoc = {
        _id: await this.nextId(c, 'queued_messages'),
        sender: input.sender,
        recipient: input.recipient,
        content: input.content,
        clientId: input.clientId,
        queueType: input.queueType,
        priority: input.priority,
        createdAt: input.at ?? new Date(),
        expiresAt: input.expiresAt,
        nextRetryAt: input.nextRetryAt ?? null,
        lastRetryAt: null,
        retryCount: input.retryCount ?? 0,
        maxRetries: input.maxRetries,
        lastError: '',
        errorCount: 0,
        isProcessed: false,
        processedAt: null,
        originalMessageId: input.originalMessageId ?? null,
      };
      await c.queued.insertOne(doc);
      return toEntity(doc);
    });
  }

  getQueuedMessage(id: number): Promise<QueuedMessage | null> {
    return this.execute('getQueuedMessage', async (c) => {
      const doc = await c.queued.findOne({ _id: id });
      return doc ? toEntity(doc) : null;
    });
  }

  findPendingQueuedMessage(lookup: PendingQueuedLookup): Promise<QueuedMessage | null> {
    return this.execute('findPendingQueuedMessage', async (c) => {
      const filter: Filter<QueuedMessageDoc> = {
        'sender.id': lookup.senderId,
        clientId: lookup.clientId,
        isProcessed: false,
      };
      if (lookup.recipientId !== undefined) filter['recipient.id'] = lookup.recipientId;
      if (lookup.queueType !== undefined) filter.queueType = lookup.queueType;
      const doc = await c.queued.findOne(filter);
      return doc ? toEntity(doc) : null;
    });
  }

  listDeliverableQueuedMessages(recipientId: UserId, now: Date): Promise<QueuedMessage[]> {
    return this.execute('listDeliverableQueuedMessages', async (c) => {
      const docs = await c.queued
        .find({ 'recipient.id': recipientId, isProcessed: false, expiresAt: { $gt: now } })
        .sort({ priority: 1, createdAt: 1, _id: 1 })
        .toArray();
      return docs.map(toEntity);
    });
  }

  listPendingOutgoingMessages(senderId: UserId, now: Date): Promise<QueuedMessage[]> {
    return this.execute('listPendingOutgoingMessages', async (c) => {
      const queueTypes: QueueType[] = ['outgoing', 'retry'];
      const docs = await c.queued
        .find({
          'sender.id': senderId,
          isProcessed: false,
          queueType: { $in: queueTypes },
          expiresAt: { $gt: now },
        })
        .sort({ createdAt: 1, _id: 1 })
        .toArray();
      return docs.map(toEntity);
    });
  }

  listPendingRetries(now: Date, limit: number): Promise<QueuedMessage[]> {
    return this.execute('listPendingRetries', async (c) => {
      const docs = await c.queued
        .find({
          isProcessed: false,
          nextRetryAt: { $ne: null, $lte: now },
          $expr: { $lt: ['$retryCount', '$maxRetries'] },
        })
        .sort({ priority: 1, nextRetryAt: 1, _id: 1 })
        .limit(limit)
        .toArray();
      return docs.map(toEntity);
    });
  }

  updateQueuedMessage(id: number, patch: QueuedMessagePatch): Promise<QueuedMessage | null> {
    return this.execute('updateQueuedMessage', async (c) => {
      const doc = await c.queued.findOneAndUpdate(
        { _id: id },
        { $set: patch },
        { returnDocument: 'after' },
      );
      return doc ? toEntity(doc) : null;
    });
  }

  deleteExpiredQueuedMessages(now: Date): Promise<number> {
    return this.execute('deleteExpiredQueuedMessages', async (c) => {
      const result = await c.queued.deleteMany({ expiresAt: { $lt: now } });
      return result.deletedCount;
    });
  }

  countQueuedMessages(userId: UserId | null, now: Date): Promise<QueueCounts> {
    return this.execute('countQueuedMessages', async (c) => {
      const scope: Filter<QueuedMessageDoc> =
        userId === null ? {} : { $or: [{ 'sender.id': userId }, { 'recipient.id': userId }] };

      const [totalQueued, totalProcessed, pendingRetries, expiredMessages, unprocessed] =
        await Promise.all([
          c.queued.countDocuments({ ...scope, isProcessed: false }),
          c.queued.countDocuments({ ...scope, isProcessed: true }),
          c.queued.countDocuments({
            isProcessed: false,
            nextRetryAt: { $ne: null, $lte: now },
            $expr: { $lt: ['$retryCount', '$maxRetries'] },
          }),
          c.queued.countDocuments({ ...scope, expiresAt: { $lt: now } }),
          c.queued
            .find({ ...scope, isProcessed: false })
            .project<{ queueType: QueueType; priority: QueuedMessage['priority'] }>({
              queueType: 1,
              priority: 1,
            })
            .toArray(),
        ]);

      const counts: QueueCounts = {
        totalQueued,
        totalProcessed,
        byQueueType: { outgoing: 0, incoming: 0, retry: 0 },
        byPriority: { '1': 0, '2': 0, '3': 0 },
        pendingRetries,
        expiredMessages,
      };
      for (const entry of unprocessed) {
        counts.byQueueType[entry.queueType]++;
        if (entry.priority === 1) counts.byPriority['1']++;
        else if (entry.priority === 2) counts.byPriority['2']++;
        else counts.byPriority['3']++;
      }
      return counts;
    });
  }

  // Notifications

  createNotification(input: CreateNotificationInput): Promise<Notification> {
    return this.execute('createNotification', async (c) => {
      const doc: NotificationDoc = {
        _id: await this.nextId(c, 'notifications'),
        recipient: input.recipient,
        sender: input.sender ?? null,
        notificationType: input.notificationType,
        title: input.title,
        message: input.message,
        priority: input.priority ?? 'normal',
        actionUrl: input.actionUrl ?? null,
        groupKey: input.groupKey ?? null,
        isGrouped: Boolean(input.groupKey),
        groupCount: 1,
        isRead: false,
        readAt: null,
        isDelivered: false,
        deliveredAt: null,
        createdAt: input.at ?? new Date(),
      };
      await c.notifications.insertOne(doc);
      return toEntity(doc);
    });
  }

  getNotification(id: number): Promise<Notification | null> {
    return this.execute('getNotification', async (c) => {
      const doc = await c.notifications.findOne({ _id: id });
      return doc ? toEntity(doc) : null;
    });
  }

  findGroupedNotification(
    recipientId: UserId,
    groupKey: string,
    since: Date,
  ): Promise<Notification | null> {
    return this.execute('findGroupedNotification', async (c) => {
      const doc = await c.notifications.findOne(
        { 'recipient.id': recipientId, groupKey, isGrouped: true, createdAt: { $gte: since } },
        { sort: { createdAt: -1 } },
      );
      return doc ? toEntity(doc) : null;
    });
  }

  updateNotification(id: number, patch: NotificationPatch): Promise<Notification | null> {
    return this.execute('updateNotification', async (c) => {
      const doc = await c.notifications.findOneAndUpdate(
        { _id: id },
        { $set: patch },
        { returnDocument: 'after' },
      );
      return doc ? toEntity(doc) : null;
    });
  }

  listNotifications(recipientId: UserId, query: NotificationQuery): Promise<Notification[]> {
    return this.execute('listNotifications', async (c) => {
      const filter: Document = { 'recipient.id': recipientId };
      if (query.notificationType) filter.notificationType = query.notificationType;
      if (query.unreadOnly) filter.isRead = false;
      const docs = await c.notifications
        .find(filter)
        .sort({ createdAt: -1, _id: -1 })
        .skip(query.offset)
        .limit(query.limit)
        .toArray();
      return docs.map(toEntity);
    });
  }

  countUnreadNotifications(recipientId: UserId): Promise<number> {
    return this.execute('countUnreadNotifications', (c) =>
      c.notifications.countDocuments({ 'recipient.id': recipientId, isRead: false }),
    );
  }

  markNotificationRead(id: number, recipientId: UserId, readAt: Date): Promise<boolean> {
    return this.execute('markNotificationRead', async (c) => {
      const owned = await c.notifications.countDocuments({ _id: id, 'recipient.id': recipientId });
      if (owned === 0) return false;
      await c.notifications.updateOne({ _id: id, isRead: false }, { $set: { isRead: true, readAt } });
      return true;
    });
  }

  markAllNotificationsRead(
    recipientId: UserId,
    readAt: Date,
    notificationType?: string | null,
  ): Promise<number> {
    return this.execute('markAllNotificationsRead', async (c) => {
      const filter: Document = { 'recipient.id': recipientId, isRead: false };
      if (notificationType) filter.notificationType = notificationType;
      const result = await c.notifications.updateMany(filter, { $set: { isRead: true, readAt } });
      return result.modifiedCount;
    });
  }

  deleteReadNotificationsBefore(cutoff: Date): Promise<number> {
    return this.execute('deleteReadNotificationsBefore', async (c) => {
      const result = await c.notifications.deleteMany({ isRead: true, createdAt: { $lt: cutoff } });
      return result.deletedCount;
    });
  }

  getNotificationPreference(
    userId: UserId,
    type: NotificationType,
  ): Promise<NotificationPreference | null> {
    return this.execute('getNotificationPreference', async (c) => {
      const doc = await c.preferences.findOne({ _id: preferenceKey(userId, type) });
      return doc ? stripId(doc) : null;
    });
  }

  saveNotificationPreference(input: NotificationPreferenceInput): Promise<NotificationPreference> {
    return this.execute('saveNotificationPreference', async (c) => {
      const doc = await c.preferences.findOneAndUpdate(
        { _id: preferenceKey(input.userId, input.notificationType) },
        {
          $set: {
            deliveryMethod: input.deliveryMethod,
            isEnabled: input.isEnabled,
            quietHoursStart: input.quietHoursStart,
            quietHoursEnd: input.quietHoursEnd,
          },
          $setOnInsert: { userId: input.userId, notificationType: input.notificationType },
        },
        { upsert: true, returnDocument: 'after' },
      );
      if (!doc) throw new StorageError('Preference upsert returned no document', 'mongo');
      return {
        userId: doc.userId,
        notificationType: doc.notificationType,
        deliveryMethod: doc.deliveryMethod ?? 'realtime',
        isEnabled: doc.isEnabled ?? true,
        quietHoursStart: doc.quietHoursStart ?? null,
        quietHoursEnd: doc.quietHoursEnd ?? null,
      };
    });
  }

  // Presence

  getUserStatus(userId: UserId): Promise<UserStatus | null> {
    return this.execute('getUserStatus', async (c) => {
      const doc = await c.statuses.findOne({ _id: userId });
      return doc ? stripId(doc) : null;
    });
  }

  incrementConnections(
    user: UserRef,
    connectionId: string,
    deviceInfo: Record<string, unknown>,
    at: Date,
  ): Promise<UserStatus> {
    return this.execute('incrementConnections', async (c) => {
      const doc = await c.statuses.findOneAndUpdate(
        { _id: user.id },
        {
          $inc: { activeConnections: 1 },
          $set: { user, isOnline: true, lastSeen: at, connectionId, deviceInfo },
          $max: { lastPing: at },
        },
        { upsert: true, returnDocument: 'after' },
      );
      if (!doc) throw new StorageError('Status upsert returned no document', 'mongo');
      return stripId(doc);
    });
  }

  decrementConnections(user: UserRef, at: Date): Promise<UserStatus> {
    return this.execute('decrementConnections', async (c) => {
      const decremented = await c.statuses.findOneAndUpdate(
        { _id: user.id, activeConnections: { $gt: 0 } },
        { $inc: { activeConnections: -1 }, $set: { lastSeen: at } },
        { returnDocument: 'after' },
      );
      if (decremented && decremented.activeConnections > 0) {
        return stripId(decremented);
      }

      // Only flips offline while the counter is still zero
      try {
        const offline = await c.statuses.findOneAndUpdate(
          { _id: user.id, activeConnections: { $lte: 0 } },
          {
            $set: { user, isOnline: false, activeConnections: 0, connectionId: null, lastSeen: at },
            $setOnInsert: { lastPing: null, deviceInfo: {} },
          },
          { upsert: true, returnDocument: 'after' },
        );
        if (offline) return stripId(offline);
      } catch (error) {
        if (!(error instanceof MongoServerError && error.code === DUPLICATE_KEY)) throw error;
      }

      const current = await c.statuses.findOne({ _id: user.id });
      if (!current) throw new StorageError('Status update returned no document', 'mongo');
      return stripId(current);
    });
  }

  touchUserStatus(userId: UserId, at: Date): Promise<UserStatus | null> {
    return this.execute('touchUserStatus', async (c) => {
      const doc = await c.statuses.findOneAndUpdate(
        { _id: userId },
        { $max: { lastPing: at } },
        { returnDocument: 'after' },
      );
      return doc ? stripId(doc) : null;
    });
  }

  resetStaleUserStatuses(cutoff: Date, at: Date): Promise<UserStatus[]> {
    return this.execute('resetStaleUserStatuses', async (c) => {
      const stale: Filter<UserStatusDoc> = {
        isOnline: true,
        $or: [{ lastPing: null }, { lastPing: { $lt: cutoff } }],
      };
      const docs = await c.statuses.find(stale).toArray();
      if (docs.length === 0) return [];

      await c.statuses.updateMany(
        { _id: { $in: docs.map((doc) => doc._id) }, ...stale },
        { $set: { isOnline: false, activeConnections: 0, connectionId: null, lastSeen: at } },
      );
      return docs.map((doc) => ({
        ...stripId(doc),
        isOnline: false,
        activeConnections: 0,
        connectionId: null,
        lastSeen: at,
      }));
    });
  }

  forceUserOffline(userId: UserId, at: Date): Promise<UserStatus | null> {
    return this.execute('forceUserOffline', async (c) => {
      const doc = await c.statuses.findOneAndUpdate(
        { _id: userId },
        { $set: { isOnline: false, activeConnections: 0, connectionId: null, lastSeen: at } },
        { returnDocument: 'after' },
      );
      return doc ? stripId(doc) : null;
    });
  }

  listUserStatuses(query: UserStatusQuery = {}): Promise<UserStatus[]> {
    return this.execute('listUserStatuses', async (c) => {
      const filter: Filter<UserStatusDoc> = query.onlineOnly ? { isOnline: true } : {};
      let cursor = c.statuses.find(filter).sort({ lastPing: -1 });
      if (query.limit !== undefined) cursor = cursor.limit(query.limit);
      const docs = await cursor.toArray();
      return docs.map((doc: WithId<UserStatusDoc>) => stripId(doc));
    });
  }

  // Typing

  upsertTypingStatus(
    user: UserRef,
    partner: UserRef,
    isTyping: boolean,
    at: Date,
  ): Promise<TypingUpdateResult> {
    return this.execute('upsertTypingStatus', async (c) => {
      const before = await c.typing.findOneAndUpdate(
        { _id: typingKey(user.id, partner.id) },
        { $set: { user, chatPartner: partner, isTyping, lastUpdated: at } },
        { upsert: true, returnDocument: 'before' },
      );
      const changed = before ? before.isTyping !== isTyping : isTyping;
      return { status: { user, chatPartner: partner, isTyping, lastUpdated: at }, changed };
    });
  }

  listTypingToward(partnerId: UserId): Promise<TypingStatus[]> {
    return this.execute('listTypingToward', async (c) => {
      const docs = await c.typing.find({ 'chatPartner.id': partnerId, isTyping: true }).toArray();
      return docs.map((doc: WithId<TypingStatusDoc>) => stripId(doc));
    });
  }

  resetStaleTypingStatuses(cutoff: Date, at: Date): Promise<TypingStatus[]> {
    return this.execute('resetStaleTypingStatuses', async (c) => {
      const stale: Filter<TypingStatusDoc> = { isTyping: true, lastUpdated: { $lt: cutoff } };
      const docs = await c.typing.find(stale).toArray();
      if (docs.length === 0) return [];
      await c.typing.updateMany(
        { _id: { $in: docs.map((doc) => doc._id) }, ...stale },
        { $set: { isTyping: false, lastUpdated: at } },
      );
      return docs.map((doc) => ({ ...stripId(doc), isTyping: false, lastUpdated: at }));
    });
  }

  // Error audit log

  createErrorRecord(input: CreateErrorRecordInput): Promise<MessagingErrorRecord> {
    return this.execute('createErrorRecord', async (c) => {
      const doc: ErrorRecordDoc = {
        _id: await this.nextId(c, 'messaging_errors'),
        errorType: input.errorType,
        message: input.message,
        severity: input.severity,
        context: input.context,
        userId: input.userId ?? null,
        createdAt: input.at ?? new Date(),
        resolved: false,
        resolvedAt: null,
        resolutionNotes: '',
      };
      await c.errors.insertOne(doc);
      return toEntity(doc);
    });
  }

  resolveErrorRecord(id: number, notes: string, at: Date): Promise<boolean> {
    return this.execute('resolveErrorRecord', async (c) => {
      const result = await c.errors.updateOne(
        { _id: id },
        { $set: { resolved: true, resolvedAt: at, resolutionNotes: notes } },
      );
      return result.matchedCount > 0;
    });
  }

  listErrorRecords(query: { resolved?: boolean; limit?: number } = {}): Promise<MessagingErrorRecord[]> {
    return this.execute('listErrorRecords', async (c) => {
      const filter: Filter<ErrorRecordDoc> = query.resolved === undefined ? {} : { resolved: query.resolved };
      let cursor = c.errors.find(filter).sort({ createdAt: -1, _id: -1 });
      if (query.limit !== undefined) cursor = cursor.limit(query.limit);
      const docs = await cursor.toArray();
      return docs.map(toEntity);
    });
  }

  async ping(): Promise<boolean> {
    try {
      if (!this.db) return false;
      await this.db.command({ ping: 1 });
      return true;
    } catch (error) {
      this.logger.warn('MongoDB ping failed', {
        error: toError(error).message,
        action: 'mongo_ping_failed',
      });
      return false;
    }
  }
}

/**
 * Factory function to create and connect a MongoMessagingStore
 */
export async function createMongoStore(config: MongoMessagingStoreConfig): Promise<MongoMessagingStore> {
  const store = new MongoMessagingStore(config);
  await store.connect();
  return store;
}

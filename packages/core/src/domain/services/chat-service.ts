/**
 * ChatService - rooms, memberships and messages
 *
 * Every change a room's participants should see live is emitted as a
 * ChatEvent; the socket gateway subscribes and fans it out.
 */

import { EventEmitter } from 'events';
import type { User, UserSummary } from '../entities/accounts.js';
import { displayNameOf, toUserSummary } from '../entities/accounts.js';
import type { ChatMembership, ChatRoom, MembershipRole, Message, MessagePayload, MessageType } from '../entities/chat.js';
import type { UploadInput } from '../entities/common.js';
import type { Project } from '../entities/projects.js';
import type { RepositoryProvider } from '../repositories/collections.js';
import { NotFoundError, PermissionDeniedError, ValidationError } from '../repositories/errors.js';
import type { DomainLogger } from '../../infrastructure/logging/domain-logger.js';
import { errorMessage } from '../../infrastructure/logging/domain-logger.js';
import { MAX_ATTACHMENT_BYTES, MAX_IMAGE_BYTES, validateImage, type MediaStorage } from '../../infrastructure/media/media-storage.js';
import { nowIso } from '../utils/dates.js';
import type { NotificationService } from './notification-service.js';
import type { ModerationService } from './moderation-service.js';
import { validateRequiredString } from './validators.js';

const DEFAULT_MESSAGE_PAGE = 50;
const SEARCH_LIMIT = 50;
const REPLY_PREVIEW_LENGTH = 100;
const NOTIFICATION_PREVIEW_LENGTH = 100;
const CHAT_EVENT = 'chat';

// ============================================================================
// Types
// ============================================================================

export type ChatEvent =
  | { type: 'chat_message'; roomId: string; message: MessagePayload }
  | { type: 'message_edited'; roomId: string; message: MessagePayload }
  | { type: 'message_deleted'; roomId: string; messageId: string }
  | { type: 'message_read'; roomId: string; messageId: string; userId: string };

export type ChatEventListener = (event: ChatEvent) => void;

export interface RoomSummary extends ChatRoom {
  participants: UserSummary[];
  lastMessage: MessagePayload | null;
  unreadCount: number;
}

export interface ParticipantStatus {
  user: UserSummary;
  isOnline: boolean;
  lastSeen: string | null;
  role: MembershipRole;
  lastSeenInRoom: string | null;
}

export interface MessagePageInput {
  before?: string;
  limit?: number;
}

export interface CreateRoomInput {
  name: string;
  participantIds: string[];
}

export interface ChatStats {
  unreadMessages: number;
  totalRooms: number;
  activeRooms: number;
}

export interface ChatServiceOptions {
  notifications: NotificationService;
  moderation: ModerationService;
  media: MediaStorage;
  logger?: DomainLogger;
}

// ============================================================================
// Service
// ============================================================================

export class ChatService {
  private readonly events = new EventEmitter();

  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly options: ChatServiceOptions
  ) {}

  /**
   * @returns unsubscribe function
   */
  public subscribe(listener: ChatEventListener): () => void {
    this.events.on(CHAT_EVENT, listener);
    return () => {
      this.events.off(CHAT_EVENT, listener);
    };
  }

  private emit(event: ChatEvent): void {
    try {
      this.events.emit(CHAT_EVENT, event);
    } catch (error) {
      this.options.logger?.warn?.(`Chat event listener failed: ${errorMessage(error)}`, { type: event.type });
    }
  }

  // ==========================================================================
  // Rooms
  // ==========================================================================

  public async listRooms(userId: string): Promise<RoomSummary[]> {
    const rooms = await this.repositories
      .repository('chat-rooms')
      .findMany((room) => room.isActive && room.participantIds.includes(userId));
    rooms.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
    const summaries: RoomSummary[] = [];
    for (const room of rooms) {
      summaries.push(await this.summarize(room, userId));
    }
    return summaries;
  }

  public async getRoom(roomId: string, userId: string): Promise<RoomSummary> {
    const room = await this.requireParticipant(roomId, userId);
    return this.summarize(room, userId);
  }

  /**
   * Group room with the creator as owner
   */
  public async createRoom(creatorId: string, input: CreateRoomInput): Promise<ChatRoom> {
    validateRequiredString(input.name, 'name');
    const participantIds = unique([creatorId, ...input.participantIds]);
    const users = await this.repositories.repository('users').findByIds(participantIds);
    if (users.length !== participantIds.length) {
      throw new ValidationError('Unknown participant', [{ field: 'participantIds', message: 'Unknown participant' }]);
    }
    const room = await this.repositories.repository('chat-rooms').create({
      name: input.name.trim(),
      roomType: 'group',
      participantIds,
      isActive: true,
      createdById: creatorId,
    });
    for (const userId of participantIds) {
      await this.addMembership(room.id, userId, userId === creatorId ? 'owner' : 'member');
    }
    return room;
  }

  /**
   * Existing active direct room of exactly {a, b}, or a new one
   */
  public async getOrCreateDirectRoom(userId: string, otherUserId: string): Promise<ChatRoom> {
    if (userId === otherUserId) {
      throw new ValidationError('Cannot start a chat with yourself', [{ field: 'userId', message: 'Cannot message yourself' }]);
    }
    const rooms = this.repositories.repository('chat-rooms');
    const [user, other] = await Promise.all([this.requireUser(userId), this.requireUser(otherUserId)]);
    const key = [userId, otherUserId].sort().join('-');
    return rooms.withLock(`direct-${key}`, async () => {
      const existing = await rooms.findOne(
        (room) =>
          room.roomType === 'direct' &&
          room.isActive &&
          room.participantIds.length === 2 &&
          room.participantIds.includes(userId) &&
          room.participantIds.includes(otherUserId)
      );
      if (existing !== null) {
        return existing;
      }
      const room = await rooms.create({
        name: `${displayNameOf(user)} & ${displayNameOf(other)}`,
        roomType: 'direct',
        participantIds: [userId, otherUserId],
        isActive: true,
        createdById: userId,
      });
      await this.addMembership(room.id, userId, 'owner');
      await this.addMembership(room.id, otherUserId, 'member');
      return room;
    });
  }

  /**
   * One room per project; the client and the assigned contractor join
   */
  public async createProjectRoom(project: Pick<Project, 'id' | 'title' | 'clientId' | 'contractorId'>, createdById: string): Promise<ChatRoom> {
    const rooms = this.repositories.repository('chat-rooms');
    return rooms.withLock(`project-${project.id}`, async () => {
      const participantIds = unique([project.clientId, ...(project.contractorId !== undefined ? [project.contractorId] : [])]);
      const existing = await rooms.findOne((room) => room.roomType === 'project' && room.projectId === project.id);
      if (existing !== null) {
        const missing = participantIds.filter((id) => !existing.participantIds.includes(id));
        if (missing.length === 0) {
          return existing;
        }
        for (const userId of missing) {
          await this.addMembership(existing.id, userId, 'member');
        }
        return rooms.update(existing.id, { participantIds: [...existing.participantIds, ...missing] });
      }
      const room = await rooms.create({
        name: `Project: ${project.title}`,
        roomType: 'project',
        participantIds,
        projectId: project.id,
        isActive: true,
        createdById,
      });
      for (const userId of participantIds) {
        await this.addMembership(room.id, userId, userId === createdById ? 'owner' : 'member');
      }
      return room;
    });
  }

  public async isParticipant(roomId: string, userId: string): Promise<boolean> {
    const room = await this.repositories.repository('chat-rooms').findByIdOrNull(roomId);
    return room !== null && room.participantIds.includes(userId);
  }

  public async roomIdsOf(userId: string): Promise<string[]> {
    const rooms = await this.repositories.repository('chat-rooms').findMany((room) => room.participantIds.includes(userId));
    return rooms.map((room) => room.id);
  }

  public async participantIdsOf(roomId: string): Promise<string[]> {
    const room = await this.repositories.repository('chat-rooms').findByIdOrNull(roomId);
    return room?.participantIds ?? [];
  }

  public async listParticipants(roomId: string, userId: string): Promise<ParticipantStatus[]> {
    const room = await this.requireParticipant(roomId, userId);
    const [users, memberships] = await Promise.all([
      this.repositories.repository('users').findByIds(room.participantIds),
      this.repositories.repository('chat-memberships').findMany((m) => m.roomId === roomId),
    ]);
    return users.map((user) => {
      const membership = memberships.find((m) => m.userId === user.id);
      return {
        user: toUserSummary(user),
        isOnline: user.isOnline,
        lastSeen: user.lastSeen ?? null,
        role: membership?.role ?? 'member',
        lastSeenInRoom: membership?.lastSeenAt ?? null,
      };
    });
  }

  /**
   * Admins or owners may add; in direct rooms any participant may, and the
   * room becomes a group
   */
  public async addParticipant(roomId: string, userId: string, addedById: string): Promise<ChatRoom> {
    const rooms = this.repositories.repository('chat-rooms');
    const { updated, user, addedBy } = await rooms.withLock(`participants-${roomId}`, async () => {
      const room = await this.requireParticipant(roomId, addedById);
      if (room.roomType !== 'direct' && !(await this.hasManagerRole(roomId, addedById))) {
        throw new PermissionDeniedError("You don't have permission to add participants");
      }
      if (room.participantIds.includes(userId)) {
        throw new ValidationError('User is already a participant in this room', [{ field: 'userId', message: 'Already a participant' }]);
      }
      const [added, by] = await Promise.all([this.requireUser(userId), this.requireUser(addedById)]);
      const saved = await rooms.update(roomId, {
        participantIds: [...room.participantIds, userId],
        roomType: room.roomType === 'direct' ? 'group' : room.roomType,
      });
      await this.addMembership(roomId, userId, 'member');
      return { updated: saved, user: added, addedBy: by };
    });
    await this.sendSystemMessage(roomId, `${displayNameOf(user)} was added to the chat by ${displayNameOf(addedBy)}`);
    return updated;
  }

  public async removeParticipant(roomId: string, userId: string, removedById: string): Promise<ChatRoom> {
    const rooms = this.repositories.repository('chat-rooms');
    const { updated, user, removedBy } = await rooms.withLock(`participants-${roomId}`, async () => {
      const room = await this.requireParticipant(roomId, removedById);
      if (userId !== removedById && !(await this.hasManagerRole(roomId, removedById))) {
        throw new PermissionDeniedError("You don't have permission to remove participants");
      }
      if (!room.participantIds.includes(userId)) {
        throw new NotFoundError('ChatMembership', userId, { message: 'User is not a participant in this room' });
      }
      const [removed, by] = await Promise.all([this.requireUser(userId), this.requireUser(removedById)]);
      const saved = await rooms.update(roomId, {
        participantIds: room.participantIds.filter((id) => id !== userId),
      });
      const memberships = this.repositories.repository('chat-memberships');
      const membership = await memberships.findOne((m) => m.roomId === roomId && m.userId === userId);
      if (membership !== null) {
        await memberships.delete(membership.id);
      }
      return { updated: saved, user: removed, removedBy: by };
    });
    const content =
      userId === removedById
        ? `${displayNameOf(user)} left the chat`
        : `${displayNameOf(user)} was removed from the chat by ${displayNameOf(removedBy)}`;
    await this.sendSystemMessage(roomId, content);
    return updated;
  }

  public async setRoomActive(roomId: string, isActive: boolean): Promise<ChatRoom> {
    return this.repositories.repository('chat-rooms').update(roomId, { isActive });
  }

  public async listAllRooms(): Promise<ChatRoom[]> {
    const rooms = await this.repositories.repository('chat-rooms').findAll();
    return rooms.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  // ==========================================================================
  // Messages
  // ==========================================================================

  /**
   * Page of messages ending before `before`, in chronological order.
   * Returned messages are marked read for the caller.
   */
  public async getRoomMessages(roomId: string, userId: string, input: MessagePageInput = {}): Promise<MessagePayload[]> {
    await this.requireParticipant(roomId, userId);
    const limit = Math.max(1, Math.min(input.limit ?? DEFAULT_MESSAGE_PAGE, 100));
    const all = chronological(await this.repositories.repository('messages').findMany((m) => m.roomId === roomId));
    let end = all.length;
    if (input.before !== undefined) {
      const index = all.findIndex((m) => m.id === input.before);
      if (index === -1) {
        throw new NotFoundError('Message', input.before, { message: 'Message not found' });
      }
      end = index;
    }
    const page = all.slice(Math.max(0, end - limit), end);

    const readAt = nowIso();
    const messages = this.repositories.repository('messages');
    for (const message of page) {
      if (message.senderId !== userId && !message.readBy.some((r) => r.userId === userId)) {
        message.readBy = [...message.readBy, { userId, readAt }];
        await messages.update(message.id, { readBy: message.readBy });
      }
    }
    await this.touchMembership(roomId, userId);
    return this.toPayloads(page);
  }

  public async sendMessage(
    roomId: string,
    senderId: string,
    content: string,
    messageType: Exclude<MessageType, 'system'> = 'text',
    replyToId?: string,
    attachment?: { url: string; fileName: string }
  ): Promise<MessagePayload> {
    const room = await this.requireParticipant(roomId, senderId);
    if (!room.isActive) {
      throw new PermissionDeniedError('This chat room has been blocked');
    }
    if (attachment === undefined) {
      validateRequiredString(content, 'content');
    }
    if (replyToId !== undefined) {
      const replyTo = await this.repositories.repository('messages').findByIdOrNull(replyToId);
      if (replyTo === null || replyTo.roomId !== roomId) {
        throw new ValidationError('Reply target is not in this room', [{ field: 'replyTo', message: 'Invalid reply target' }]);
      }
    }

    const message = await this.repositories.repository('messages').create({
      roomId,
      senderId,
      messageType,
      content,
      fileUrl: attachment?.url,
      fileName: attachment?.fileName,
      isEdited: false,
      replyToId,
      readBy: [],
    });
    await this.repositories.repository('chat-rooms').update(roomId, {});

    const payload = await this.toPayload(message);
    this.emit({ type: 'chat_message', roomId, message: payload });
    await this.notifyParticipants(room, senderId, payload);
    if (messageType === 'text') {
      await this.options.moderation.runHook('message', message.id, content, senderId);
    }
    return payload;
  }

  public async sendAttachment(
    roomId: string,
    senderId: string,
    upload: UploadInput,
    kind: 'image' | 'file',
    caption = ''
  ): Promise<MessagePayload> {
    if (kind === 'image') {
      validateImage(upload, MAX_IMAGE_BYTES);
    } else if (upload.size > MAX_ATTACHMENT_BYTES) {
      throw new ValidationError('File too large. Maximum size is 10MB.', [{ field: 'file', message: 'File too large', value: upload.size }]);
    }
    const room = await this.requireParticipant(roomId, senderId);
    if (!room.isActive) {
      throw new PermissionDeniedError('This chat room has been blocked');
    }
    const stored = await this.options.media.save(kind === 'image' ? 'chat_images' : 'chat_files', upload);
    return this.sendMessage(roomId, senderId, caption, kind, undefined, { url: stored.url, fileName: upload.originalName });
  }

  public async sendSystemMessage(roomId: string, content: string): Promise<MessagePayload> {
    const message = await this.repositories.repository('messages').create({
      roomId,
      senderId: null,
      messageType: 'system',
      content,
      isEdited: false,
      readBy: [],
    });
    await this.repositories.repository('chat-rooms').update(roomId, {});
    const payload = await this.toPayload(message);
    this.emit({ type: 'chat_message', roomId, message: payload });
    return payload;
  }

  public async getMessage(messageId: string, userId: string): Promise<MessagePayload> {
    const message = await this.requireMessage(messageId);
    await this.requireParticipant(message.roomId, userId);
    return this.toPayload(message);
  }

  public async editMessage(messageId: string, userId: string, content: string): Promise<MessagePayload> {
    validateRequiredString(content, 'content');
    const message = await this.requireMessage(messageId);
    if (message.senderId !== userId) {
      throw new PermissionDeniedError('You can only edit your own messages');
    }
    const updated = await this.repositories
      .repository('messages')
      .update(messageId, { content, isEdited: true, editedAt: nowIso() });
    const payload = await this.toPayload(updated);
    this.emit({ type: 'message_edited', roomId: updated.roomId, message: payload });
    return payload;
  }

  public async deleteMessage(messageId: string, userId: string): Promise<void> {
    const message = await this.requireMessage(messageId);
    if (message.senderId !== userId) {
      throw new PermissionDeniedError('You can only delete your own messages');
    }
    await this.repositories.repository('messages').delete(messageId);
    await this.options.media.delete(message.fileUrl);
    this.emit({ type: 'message_deleted', roomId: message.roomId, messageId });
  }

  /**
   * Add the caller's read receipt once
   */
  public async markMessageRead(messageId: string, userId: string): Promise<void> {
    const message = await this.requireMessage(messageId);
    await this.requireParticipant(message.roomId, userId);
    if (message.readBy.some((r) => r.userId === userId)) {
      return;
    }
    await this.repositories
      .repository('messages')
      .update(messageId, { readBy: [...message.readBy, { userId, readAt: nowIso() }] });
    this.emit({ type: 'message_read', roomId: message.roomId, messageId, userId });
  }

  public async getUnreadCount(userId: string): Promise<number> {
    const roomIds = new Set(await this.roomIdsOf(userId));
    return this.repositories
      .repository('messages')
      .count((m) => roomIds.has(m.roomId) && m.senderId !== userId && !m.readBy.some((r) => r.userId === userId));
  }

  public async searchMessages(userId: string, query: string, roomId?: string): Promise<MessagePayload[]> {
    const needle = query.trim().toLowerCase();
    if (needle === '') {
      return [];
    }
    if (roomId !== undefined) {
      await this.requireParticipant(roomId, userId);
    }
    const roomIds = new Set(roomId !== undefined ? [roomId] : await this.roomIdsOf(userId));
    const matches = await this.repositories
      .repository('messages')
      .findMany((m) => roomIds.has(m.roomId) && m.content.toLowerCase().includes(needle));
    return this.toPayloads(chronological(matches).reverse().slice(0, SEARCH_LIMIT));
  }

  public async stats(userId: string): Promise<ChatStats> {
    const rooms = await this.repositories.repository('chat-rooms').findMany((room) => room.participantIds.includes(userId));
    return {
      unreadMessages: await this.getUnreadCount(userId),
      totalRooms: rooms.length,
      activeRooms: rooms.filter((room) => room.isActive).length,
    };
  }

  // ==========================================================================
  // Payloads
  // ==========================================================================

  public async toPayload(message: Message): Promise<MessagePayload> {
    const [payload] = await this.toPayloads([message]);
    if (payload === undefined) {
      throw new NotFoundError('Message', message.id);
    }
    return payload;
  }

  private async toPayloads(messages: Message[]): Promise<MessagePayload[]> {
    const replyIds = unique(messages.flatMap((m) => (m.replyToId !== undefined ? [m.replyToId] : [])));
    const replies = await this.repositories.repository('messages').findByIds(replyIds);
    const userIds = unique(
      [...messages, ...replies].flatMap((m) => (m.senderId !== null ? [m.senderId] : []))
    );
    const users = new Map((await this.repositories.repository('users').findByIds(userIds)).map((u) => [u.id, u]));
    const repliesById = new Map(replies.map((r) => [r.id, r]));

    return messages.map((message) => {
      const sender = message.senderId !== null ? users.get(message.senderId) : undefined;
      const reply = message.replyToId !== undefined ? repliesById.get(message.replyToId) : undefined;
      const replySender = reply !== undefined && reply.senderId !== null ? users.get(reply.senderId) : undefined;
      return {
        id: message.id,
        roomId: message.roomId,
        content: message.content,
        sender: sender !== undefined ? { id: sender.id, name: displayNameOf(sender), avatar: sender.avatar ?? null } : null,
        messageType: message.messageType,
        fileUrl: message.fileUrl ?? null,
        fileName: message.fileName ?? null,
        replyTo:
          reply !== undefined
            ? {
                id: reply.id,
                content: reply.content.slice(0, REPLY_PREVIEW_LENGTH),
                senderName: replySender !== undefined ? displayNameOf(replySender) : 'System',
              }
            : null,
        isEdited: message.isEdited,
        editedAt: message.editedAt ?? null,
        createdAt: message.createdAt,
      };
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * @throws NotFoundError for unknown rooms, PermissionDeniedError for non-participants
   */
  private async requireParticipant(roomId: string, userId: string): Promise<ChatRoom> {
    const room = await this.repositories.repository('chat-rooms').findByIdOrNull(roomId);
    if (room === null) {
      throw new NotFoundError('ChatRoom', roomId, { message: 'Chat room not found' });
    }
    if (!room.participantIds.includes(userId)) {
      throw new PermissionDeniedError('User is not a participant in this room', { roomId });
    }
    return room;
  }

  private async requireMessage(messageId: string): Promise<Message> {
    const message = await this.repositories.repository('messages').findByIdOrNull(messageId);
    if (message === null) {
      throw new NotFoundError('Message', messageId, { message: 'Message not found' });
    }
    return message;
  }

  private async requireUser(userId: string): Promise<User> {
    const user = await this.repositories.repository('users').findByIdOrNull(userId);
    if (user === null) {
      throw new NotFoundError('User', userId, { message: 'User not found' });
    }
    return user;
  }

  private async hasManagerRole(roomId: string, userId: string): Promise<boolean> {
    const membership = await this.repositories
      .repository('chat-memberships')
      .findOne((m) => m.roomId === roomId && m.userId === userId);
    return membership !== null && (membership.role === 'admin' || membership.role === 'owner');
  }

  private async addMembership(roomId: string, userId: string, role: MembershipRole): Promise<ChatMembership> {
    const memberships = this.repositories.repository('chat-memberships');
    const existing = await memberships.findOne((m) => m.roomId === roomId && m.userId === userId);
    if (existing !== null) {
      return existing;
    }
    return memberships.create({ roomId, userId, role, joinedAt: nowIso(), isMuted: false, isPinned: false });
  }

  private async touchMembership(roomId: string, userId: string): Promise<void> {
    const memberships = this.repositories.repository('chat-memberships');
    const membership = await memberships.findOne((m) => m.roomId === roomId && m.userId === userId);
    if (membership !== null) {
      await memberships.update(membership.id, { lastSeenAt: nowIso() });
    }
  }

  private async summarize(room: ChatRoom, userId: string): Promise<RoomSummary> {
    const [users, messages] = await Promise.all([
      this.repositories.repository('users').findByIds(room.participantIds),
      this.repositories.repository('messages').findMany((m) => m.roomId === room.id),
    ]);
    const ordered = chronological(messages);
    const last = ordered[ordered.length - 1];
    return {
      ...room,
      participants: users.map(toUserSummary),
      lastMessage: last !== undefined ? await this.toPayload(last) : null,
      unreadCount: messages.filter((m) => m.senderId !== userId && !m.readBy.some((r) => r.userId === userId)).length,
    };
  }

  private async notifyParticipants(room: ChatRoom, senderId: string, payload: MessagePayload): Promise<void> {
    const muted = new Set(
      (await this.repositories.repository('chat-memberships').findMany((m) => m.roomId === room.id && m.isMuted)).map(
        (m) => m.userId
      )
    );
    const senderName = payload.sender?.name ?? 'Someone';
    for (const userId of room.participantIds) {
      if (userId === senderId || muted.has(userId)) {
        continue;
      }
      await this.options.notifications.createNotification({
        userId,
        type: 'new_message',
        title: `New message from ${senderName}`,
        message: payload.content !== '' ? payload.content.slice(0, NOTIFICATION_PREVIEW_LENGTH) : `Sent a ${payload.messageType}`,
        relatedObjectType: 'chat_room',
        relatedObjectId: room.id,
        extraData: { messageId: payload.id },
      });
    }
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Oldest first; equal timestamps keep storage order
 */
function chronological(messages: Message[]): Message[] {
  return [...messages].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

import { Inject, Logger, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common';
import { WebSocketGateway, type OnGatewayConnection, type OnGatewayDisconnect } from '@nestjs/websockets';
import type { IncomingMessage } from 'http';
import { WebSocket, type RawData } from 'ws';
import { CHAT_SOCKET_PATH } from '@contractor-connect/config';
import {
  isRepositoryError,
  type AccountService,
  type ChatEvent,
  type ChatService,
  type NotificationService,
  type RealtimeEvent,
  type RealtimePublisher,
} from '@contractor-connect/core';
import { ACCOUNT_SERVICE, CHAT_SERVICE, NOTIFICATION_SERVICE } from '../core/core.module.js';
import { parseClientMessage, tokenFromUrl, type ClientMessage } from './chat-protocol.js';

export const AUTH_FAILED_CLOSE_CODE = 4001;
const INTERNAL_ERROR_CLOSE_CODE = 1011;

/**
 * Real-time chat over `ws`. Clients authenticate with `?token=<access token>`.
 *
 * Persisted changes (new, edited, deleted and read messages) reach sockets
 * through ChatService events, so REST and socket senders fan out the same way.
 * Notifications for a user are pushed to every socket that user holds.
 */
@WebSocketGateway({ path: CHAT_SOCKET_PATH })
export class ChatGateway
  implements OnGatewayConnection<WebSocket>, OnGatewayDisconnect<WebSocket>, OnModuleInit, OnModuleDestroy, RealtimePublisher
{
  private readonly logger = new Logger(ChatGateway.name);
  private readonly socketsByUser = new Map<string, Set<WebSocket>>();
  private readonly userBySocket = new Map<WebSocket, string>();
  private unsubscribe: (() => void) | undefined;

  constructor(
    @Inject(ACCOUNT_SERVICE) private readonly accounts: AccountService,
    @Inject(CHAT_SERVICE) private readonly chat: ChatService,
    @Inject(NOTIFICATION_SERVICE) private readonly notifications: NotificationService
  ) {}

  public onModuleInit(): void {
    this.notifications.setPublisher(this);
    this.unsubscribe = this.chat.subscribe((event) => {
      this.forwardChatEvent(event).catch((error: unknown) => {
        this.logger.warn(`Failed to forward ${event.type}: ${this.describe(error)}`);
      });
    });
  }

  public onModuleDestroy(): void {
    this.unsubscribe?.();
    this.notifications.setPublisher(undefined);
    for (const socket of this.userBySocket.keys()) {
      socket.close();
    }
  }

  // ==========================================================================
  // Connection lifecycle
  // ==========================================================================

  public async handleConnection(client: WebSocket, request?: IncomingMessage): Promise<void> {
    const authenticated = this.authenticateSocket(client, request);

    // Frames may arrive before authentication settles
    client.on('message', (data: RawData) => {
      authenticated
        .then((userId) => (userId === undefined ? undefined : this.handleFrame(client, userId, data)))
        .catch((error: unknown) => {
          this.logger.error(`Socket message failed: ${this.describe(error)}`);
        });
    });

    try {
      const userId = await authenticated;
      if (userId === undefined) {
        return;
      }
      await this.accounts.setOnline(userId, true);
      if (!this.userBySocket.has(client)) {
        // Closed while going online
        if (this.connectionCount(userId) === 0) {
          await this.accounts.setOnline(userId, false);
        }
        return;
      }
      await this.broadcastStatus(userId, true);
      this.send(client, { type: 'connection_established', userId });
    } catch (error: unknown) {
      this.logger.error(`Socket connection failed: ${this.describe(error)}`);
      client.close(INTERNAL_ERROR_CLOSE_CODE, 'Internal error');
    }
  }

  private async authenticateSocket(client: WebSocket, request: IncomingMessage | undefined): Promise<string | undefined> {
    const token = tokenFromUrl(request?.url);
    if (token === undefined) {
      client.close(AUTH_FAILED_CLOSE_CODE, 'Authentication required');
      return undefined;
    }

    let userId: string;
    try {
      userId = (await this.accounts.authenticate(token)).user.id;
    } catch (error: unknown) {
      if (!isRepositoryError(error)) {
        throw error;
      }
      this.logger.debug(`Socket rejected: ${error.message}`);
      client.close(AUTH_FAILED_CLOSE_CODE, 'Authentication failed');
      return undefined;
    }

    // Closed while authenticating: its disconnect has already been handled
    if (client.readyState !== WebSocket.OPEN) {
      return undefined;
    }

    this.userBySocket.set(client, userId);
    const sockets = this.socketsByUser.get(userId) ?? new Set<WebSocket>();
    sockets.add(client);
    this.socketsByUser.set(userId, sockets);
    return userId;
  }

  public async handleDisconnect(client: WebSocket): Promise<void> {
    const userId = this.userBySocket.get(client);
    if (userId === undefined) {
      return;
    }
    this.userBySocket.delete(client);
    const sockets = this.socketsByUser.get(userId);
    sockets?.delete(client);
    if (sockets !== undefined && sockets.size > 0) {
      return;
    }
    this.socketsByUser.delete(userId);
    try {
      await this.accounts.setOnline(userId, false);
      await this.broadcastStatus(userId, false);
    } catch (error: unknown) {
      this.logger.warn(`Failed to mark ${userId} offline: ${this.describe(error)}`);
    }
  }

  /** Sockets currently held by the user */
  public connectionCount(userId: string): number {
    return this.socketsByUser.get(userId)?.size ?? 0;
  }

  // ==========================================================================
  // Inbound frames
  // ==========================================================================

  private async handleFrame(client: WebSocket, userId: string, data: RawData): Promise<void> {
    const parsed = parseClientMessage(this.frameText(data));
    if (!parsed.ok) {
      this.send(client, { type: 'error', message: parsed.error });
      return;
    }
    try {
      await this.dispatch(client, userId, parsed.message);
    } catch (error: unknown) {
      if (!isRepositoryError(error)) {
        throw error;
      }
      this.send(client, { type: 'error', message: error.message });
    }
  }

  private async dispatch(client: WebSocket, userId: string, message: ClientMessage): Promise<void> {
    switch (message.type) {
      case 'join_room':
        if (!(await this.chat.isParticipant(message.roomId, userId))) {
          this.send(client, { type: 'error', message: 'User is not a participant in this room' });
          return;
        }
        this.send(client, { type: 'joined_room', roomId: message.roomId });
        return;

      case 'message':
        // Broadcast happens through the chat_message event
        await this.chat.sendMessage(message.roomId, userId, message.content, 'text', message.replyTo);
        return;

      case 'typing':
        if (!(await this.chat.isParticipant(message.roomId, userId))) {
          this.send(client, { type: 'error', message: 'User is not a participant in this room' });
          return;
        }
        await this.sendToRoom(
          message.roomId,
          { type: 'typing', roomId: message.roomId, userId, isTyping: message.isTyping },
          userId
        );
        return;

      case 'read_message':
        await this.chat.markMessageRead(message.messageId, userId);
        return;

      case 'edit_message':
        await this.chat.editMessage(message.messageId, userId, message.content);
        return;
    }
  }

  // ==========================================================================
  // Outbound
  // ==========================================================================

  public publishToUser(userId: string, event: RealtimeEvent): void {
    for (const socket of this.socketsByUser.get(userId) ?? []) {
      this.send(socket, event);
    }
  }

  private async forwardChatEvent(event: ChatEvent): Promise<void> {
    switch (event.type) {
      case 'chat_message':
      case 'message_edited':
        await this.sendToRoom(event.roomId, { type: event.type, message: event.message });
        return;
      case 'message_deleted':
        await this.sendToRoom(event.roomId, { type: event.type, messageId: event.messageId });
        return;
      case 'message_read':
        await this.sendToRoom(event.roomId, { type: event.type, messageId: event.messageId, userId: event.userId });
        return;
    }
  }

  private async sendToRoom(roomId: string, event: RealtimeEvent, exceptUserId?: string): Promise<void> {
    for (const participantId of await this.chat.participantIdsOf(roomId)) {
      if (participantId !== exceptUserId) {
        this.publishToUser(participantId, event);
      }
    }
  }

  private async broadcastStatus(userId: string, isOnline: boolean): Promise<void> {
    const recipients = new Set<string>();
    for (const roomId of await this.chat.roomIdsOf(userId)) {
      for (const participantId of await this.chat.participantIdsOf(roomId)) {
        if (participantId !== userId) {
          recipients.add(participantId);
        }
      }
    }
    for (const recipient of recipients) {
      this.publishToUser(recipient, { type: 'user_status', userId, isOnline });
    }
  }

  private send(socket: WebSocket, event: RealtimeEvent): void {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify(event));
    }
  }

  private frameText(data: RawData): string {
    if (Array.isArray(data)) {
      return Buffer.concat(data).toString('utf8');
    }
    if (data instanceof ArrayBuffer) {
      return Buffer.from(data).toString('utf8');
    }
    return data.toString('utf8');
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

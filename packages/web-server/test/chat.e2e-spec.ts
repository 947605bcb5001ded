/**
 * Chat API and socket E2E Tests
 */

import request from 'supertest';
import { HttpStatus } from '@nestjs/common';
import { WebSocket, type RawData } from 'ws';
import type { ChatRoom, ChatStats, MessagePayload, ParticipantStatus, RoomSummary } from '@contractor-connect/core';
import { CHAT_SOCKET_PATH } from '@contractor-connect/config';
import { AUTH_FAILED_CLOSE_CODE, ChatGateway } from '../src/modules/chat/index.js';
import {
  createTestApp,
  cleanupTestApp,
  registerUser,
  bearer,
  type TestContext,
  type TestServer,
  type TestUser,
  type SuccessResponse,
  type ErrorResponse,
} from './setup.js';

const WAIT_TIMEOUT_MS = 3000;

type ServerEvent = Record<string, unknown> & { type: string };

function isServerEvent(value: unknown): value is ServerEvent {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

/**
 * Buffers server events so a test can wait for one that may already have arrived
 */
class SocketClient {
  private readonly received: ServerEvent[] = [];
  private readonly waiters: { match: (event: ServerEvent) => boolean; resolve: (event: ServerEvent) => void }[] = [];

  constructor(public readonly socket: WebSocket) {
    socket.on('message', (data: RawData) => {
      if (!Buffer.isBuffer(data)) {
        return;
      }
      const parsed: unknown = JSON.parse(data.toString('utf8'));
      if (!isServerEvent(parsed)) {
        return;
      }
      const index = this.waiters.findIndex((waiter) => waiter.match(parsed));
      const waiter = index === -1 ? undefined : this.waiters.splice(index, 1)[0];
      if (waiter !== undefined) {
        waiter.resolve(parsed);
      } else {
        this.received.push(parsed);
      }
    });
  }

  public waitFor(type: string, match: (event: ServerEvent) => boolean = () => true): Promise<ServerEvent> {
    const predicate = (event: ServerEvent): boolean => event.type === type && match(event);
    const index = this.received.findIndex(predicate);
    const buffered = index === -1 ? undefined : this.received.splice(index, 1)[0];
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Timed out waiting for ${type}`));
      }, WAIT_TIMEOUT_MS);
      this.waiters.push({
        match: predicate,
        resolve: (event) => {
          clearTimeout(timer);
          resolve(event);
        },
      });
    });
  }

  public send(frame: unknown): void {
    this.socket.send(typeof frame === 'string' ? frame : JSON.stringify(frame));
  }

  public close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.socket.once('close', () => {
        resolve();
      });
      this.socket.close();
    });
  }
}

function messageOf(event: ServerEvent): MessagePayload {
  return event.message as MessagePayload;
}

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function waitUntil(condition: () => boolean): Promise<void> {
  const deadline = Date.now() + WAIT_TIMEOUT_MS;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await pause(10);
  }
}

describe('Chat API (e2e)', () => {
  let context: TestContext;
  let alice: TestUser;
  let bob: TestUser;
  let mallory: TestUser;
  let port: number;

  beforeAll(async () => {
    context = await createTestApp();
    await context.app.listen(0, '127.0.0.1');
    const address: unknown = getServer().address();
    if (typeof address !== 'object' || address === null || !('port' in address) || typeof address.port !== 'number') {
      throw new Error('Test server is not listening on a TCP port');
    }
    port = address.port;
    alice = await registerUser(getServer(), 'chat-alice');
    bob = await registerUser(getServer(), 'chat-bob', 'contractor');
    mallory = await registerUser(getServer(), 'chat-mallory');
  });

  afterAll(async () => {
    await cleanupTestApp(context);
  });

  function getServer(): TestServer {
    return context.app.getHttpServer();
  }

  async function directRoom(a: TestUser, b: TestUser): Promise<ChatRoom> {
    const response = await request(getServer())
      .post(`/api/chat/direct/${b.user.id}`)
      .set('Authorization', bearer(a))
      .expect(HttpStatus.OK);
    return (response.body as SuccessResponse<ChatRoom>).data;
  }

  function socketUrl(token?: string): string {
    const query = token === undefined ? '' : `?token=${encodeURIComponent(token)}`;
    return `ws://127.0.0.1:${String(port)}${CHAT_SOCKET_PATH}${query}`;
  }

  async function connect(user: TestUser): Promise<SocketClient> {
    const socketClient = new SocketClient(new WebSocket(socketUrl(user.token)));
    await socketClient.waitFor('connection_established', (event) => event.userId === user.user.id);
    return socketClient;
  }

  // ==========================================================================
  // Rooms over REST
  // ==========================================================================

  describe('rooms', () => {
    it('reuses the direct room between two users', async () => {
      const first = await directRoom(alice, bob);
      const second = await directRoom(bob, alice);

      expect(second.id).toBe(first.id);
      expect(first.roomType).toBe('direct');
      expect(first.name).toBe('chat-alice Tester & chat-bob Tester');
    });

    it('refuses a direct room with yourself', async () => {
      const response = await request(getServer())
        .post(`/api/chat/direct/${alice.user.id}`)
        .set('Authorization', bearer(alice))
        .expect(HttpStatus.BAD_REQUEST);

      expect((response.body as ErrorResponse).error.message).toBe('Cannot start a chat with yourself');
    });

    it('keeps rooms private to participants', async () => {
      const room = await directRoom(alice, bob);

      const response = await request(getServer())
        .get(`/api/chat/rooms/${room.id}/messages`)
        .set('Authorization', bearer(mallory))
        .expect(HttpStatus.FORBIDDEN);

      expect((response.body as ErrorResponse).error.message).toBe('User is not a participant in this room');
    });

    it('announces added participants with a system message', async () => {
      const created = await request(getServer())
        .post('/api/chat/rooms')
        .set('Authorization', bearer(alice))
        .send({ name: 'Kitchen crew', participantIds: [bob.user.id] })
        .expect(HttpStatus.CREATED);
      const room = (created.body as SuccessResponse<ChatRoom>).data;

      await request(getServer())
        .post(`/api/chat/rooms/${room.id}/add-participant`)
        .set('Authorization', bearer(bob))
        .send({ userId: mallory.user.id })
        .expect(HttpStatus.FORBIDDEN);

      await request(getServer())
        .post(`/api/chat/rooms/${room.id}/add-participant`)
        .set('Authorization', bearer(alice))
        .send({ userId: mallory.user.id })
        .expect(HttpStatus.OK);

      const messages = await request(getServer())
        .get(`/api/chat/rooms/${room.id}/messages`)
        .set('Authorization', bearer(mallory))
        .expect(HttpStatus.OK);
      const [system] = (messages.body as SuccessResponse<MessagePayload[]>).data;
      expect(system?.messageType).toBe('system');
      expect(system?.content).toBe('chat-mallory Tester was added to the chat by chat-alice Tester');

      const participants = await request(getServer())
        .get(`/api/chat/rooms/${room.id}/participants`)
        .set('Authorization', bearer(alice))
        .expect(HttpStatus.OK);
      const roles = (participants.body as SuccessResponse<ParticipantStatus[]>).data.map((p) => [p.user.username, p.role]);
      expect(roles).toEqual(
        expect.arrayContaining([
          ['chat-alice', 'owner'],
          ['chat-bob', 'member'],
          ['chat-mallory', 'member'],
        ])
      );
    });
  });

  // ==========================================================================
  // Messages over REST
  // ==========================================================================

  describe('messages', () => {
    it('tracks unread messages until the room is read', async () => {
      const room = await directRoom(alice, bob);
      const sent = await request(getServer())
        .post(`/api/chat/rooms/${room.id}/messages`)
        .set('Authorization', bearer(alice))
        .send({ content: 'Can you start on Monday?' })
        .expect(HttpStatus.CREATED);
      const message = (sent.body as SuccessResponse<MessagePayload>).data;
      expect(message.sender?.name).toBe('chat-alice Tester');

      const before = await request(getServer())
        .get(`/api/chat/rooms/${room.id}`)
        .set('Authorization', bearer(bob))
        .expect(HttpStatus.OK);
      const summary = (before.body as SuccessResponse<RoomSummary>).data;
      expect(summary.unreadCount).toBeGreaterThan(0);
      expect(summary.lastMessage?.id).toBe(message.id);

      await request(getServer())
        .get(`/api/chat/rooms/${room.id}/messages`)
        .set('Authorization', bearer(bob))
        .expect(HttpStatus.OK);

      const after = await request(getServer())
        .get(`/api/chat/rooms/${room.id}`)
        .set('Authorization', bearer(bob))
        .expect(HttpStatus.OK);
      expect((after.body as SuccessResponse<RoomSummary>).data.unreadCount).toBe(0);

      const stats = await request(getServer()).get('/api/chat/stats').set('Authorization', bearer(bob)).expect(HttpStatus.OK);
      expect((stats.body as SuccessResponse<ChatStats>).data.totalRooms).toBe(2);
    });

    it('quotes the message being replied to', async () => {
      const room = await directRoom(alice, bob);
      const original = await context.core.chat.sendMessage(room.id, alice.user.id, 'Bring the tile samples');

      const response = await request(getServer())
        .post(`/api/chat/rooms/${room.id}/messages`)
        .set('Authorization', bearer(bob))
        .send({ content: 'Will do', replyTo: original.id })
        .expect(HttpStatus.CREATED);

      const reply = (response.body as SuccessResponse<MessagePayload>).data;
      expect(reply.replyTo).toEqual({ id: original.id, content: 'Bring the tile samples', senderName: 'chat-alice Tester' });
    });

    it('only lets the sender edit or delete a message', async () => {
      const room = await directRoom(alice, bob);
      const message = await context.core.chat.sendMessage(room.id, alice.user.id, 'Typo here');

      await request(getServer())
        .patch(`/api/chat/messages/${message.id}`)
        .set('Authorization', bearer(bob))
        .send({ content: 'Not yours' })
        .expect(HttpStatus.FORBIDDEN);

      const edited = await request(getServer())
        .patch(`/api/chat/messages/${message.id}`)
        .set('Authorization', bearer(alice))
        .send({ content: 'Fixed typo' })
        .expect(HttpStatus.OK);
      const payload = (edited.body as SuccessResponse<MessagePayload>).data;
      expect(payload.content).toBe('Fixed typo');
      expect(payload.isEdited).toBe(true);

      await request(getServer())
        .delete(`/api/chat/messages/${message.id}`)
        .set('Authorization', bearer(alice))
        .expect(HttpStatus.OK);
      await request(getServer())
        .get(`/api/chat/messages/${message.id}`)
        .set('Authorization', bearer(alice))
        .expect(HttpStatus.NOT_FOUND);
    });

    it('searches messages across the caller rooms', async () => {
      const room = await directRoom(alice, bob);
      await context.core.chat.sendMessage(room.id, alice.user.id, 'The grout colour is charcoal');

      const response = await request(getServer())
        .get('/api/chat/search')
        .query({ q: 'CHARCOAL' })
        .set('Authorization', bearer(bob))
        .expect(HttpStatus.OK);
      const results = (response.body as SuccessResponse<MessagePayload[]>).data;
      expect(results.map((m) => m.content)).toEqual(['The grout colour is charcoal']);

      const outsider = await request(getServer())
        .get('/api/chat/search')
        .query({ q: 'charcoal' })
        .set('Authorization', bearer(mallory))
        .expect(HttpStatus.OK);
      expect((outsider.body as SuccessResponse<MessagePayload[]>).data).toEqual([]);
    });
  });

  // ==========================================================================
  // Socket
  // ==========================================================================

  describe('socket', () => {
    let room: ChatRoom;
    let aliceSocket: SocketClient;
    let bobSocket: SocketClient;

    beforeAll(async () => {
      room = await directRoom(alice, bob);
      bobSocket = await connect(bob);
      aliceSocket = await connect(alice);
    });

    afterAll(async () => {
      await aliceSocket.close();
      await bobSocket.close();
    });

    it('closes unauthenticated sockets with the auth failure code', async () => {
      const code = await new Promise<number>((resolve) => {
        const socket = new WebSocket(socketUrl());
        socket.on('close', (closeCode: number) => {
          resolve(closeCode);
        });
      });

      expect(code).toBe(AUTH_FAILED_CLOSE_CODE);
    });

    it('closes sockets with a forged token', async () => {
      const code = await new Promise<number>((resolve) => {
        const socket = new WebSocket(socketUrl('forged-token'));
        socket.on('close', (closeCode: number) => {
          resolve(closeCode);
        });
      });

      expect(code).toBe(AUTH_FAILED_CLOSE_CODE);
    });

    it('does not register a socket that closed during authentication', async () => {
      const carol = await registerUser(getServer(), 'chat-carol');
      const gateway = context.app.get(ChatGateway);
      const accounts = context.core.accounts;
      const authenticate = accounts.authenticate.bind(accounts);
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const spy = jest.spyOn(accounts, 'authenticate').mockImplementationOnce(async (token: string) => {
        await gate;
        return authenticate(token);
      });

      try {
        const socket = new WebSocket(socketUrl(carol.token));
        await new Promise<void>((resolve, reject) => {
          socket.once('open', () => {
            resolve();
          });
          socket.once('error', reject);
        });
        await waitUntil(() => spy.mock.calls.length > 0);
        await new Promise<void>((resolve) => {
          socket.on('close', () => {
            resolve();
          });
          socket.terminate();
        });
        await pause(100);

        release();
        await spy.mock.results[0]?.value;
        await pause(100);

        expect(gateway.connectionCount(carol.user.id)).toBe(0);
        expect((await accounts.getUser(carol.user.id)).isOnline).toBe(false);
      } finally {
        spy.mockRestore();
      }
    });

    it('tells room partners when a user comes online', async () => {
      const status = await bobSocket.waitFor('user_status', (event) => event.userId === alice.user.id);

      expect(status.isOnline).toBe(true);
      const aliceUser = await context.core.accounts.getUser(alice.user.id);
      expect(aliceUser.isOnline).toBe(true);
    });

    it('confirms joining a room the user belongs to', async () => {
      aliceSocket.send({ type: 'join_room', roomId: room.id });

      const joined = await aliceSocket.waitFor('joined_room');
      expect(joined.roomId).toBe(room.id);
    });

    it('refuses to join a room of others', async () => {
      const mallorySocket = await connect(mallory);
      mallorySocket.send({ type: 'join_room', roomId: room.id });

      const error = await mallorySocket.waitFor('error');
      expect(error.message).toBe('User is not a participant in this room');
      await mallorySocket.close();
    });

    it('delivers socket messages to both participants', async () => {
      aliceSocket.send({ type: 'message', roomId: room.id, content: '  Hello from the socket  ' });

      const received = await bobSocket.waitFor('chat_message', (event) => messageOf(event).content === 'Hello from the socket');
      const echoed = await aliceSocket.waitFor('chat_message', (event) => messageOf(event).content === 'Hello from the socket');
      expect(messageOf(received).sender?.id).toBe(alice.user.id);
      expect(messageOf(echoed).id).toBe(messageOf(received).id);
    });

    it('fans REST messages out to sockets', async () => {
      await request(getServer())
        .post(`/api/chat/rooms/${room.id}/messages`)
        .set('Authorization', bearer(bob))
        .send({ content: 'Sent over HTTP' })
        .expect(HttpStatus.CREATED);

      const received = await aliceSocket.waitFor('chat_message', (event) => messageOf(event).content === 'Sent over HTTP');
      expect(messageOf(received).sender?.id).toBe(bob.user.id);
    });

    it('relays typing indicators to the other participant', async () => {
      aliceSocket.send({ type: 'typing', roomId: room.id, isTyping: true });

      const typing = await bobSocket.waitFor('typing');
      expect(typing).toEqual({ type: 'typing', roomId: room.id, userId: alice.user.id, isTyping: true });
    });

    it('broadcasts read receipts and edits', async () => {
      const message = await context.core.chat.sendMessage(room.id, alice.user.id, 'Please confirm');

      bobSocket.send({ type: 'read_message', messageId: message.id });
      const read = await aliceSocket.waitFor('message_read', (event) => event.messageId === message.id);
      expect(read.userId).toBe(bob.user.id);

      aliceSocket.send({ type: 'edit_message', messageId: message.id, content: 'Please confirm by Friday' });
      const edited = await bobSocket.waitFor('message_edited', (event) => messageOf(event).id === message.id);
      expect(messageOf(edited).content).toBe('Please confirm by Friday');
    });

    it('reports malformed frames', async () => {
      aliceSocket.send('not json');
      const invalidJson = await aliceSocket.waitFor('error');
      expect(invalidJson.message).toBe('Invalid JSON format');

      aliceSocket.send({ type: 'message', roomId: room.id, content: '   ' });
      const emptyContent = await aliceSocket.waitFor('error');
      expect(emptyContent.message).toBe('content: content is required');
    });

    it('reports refused edits as errors', async () => {
      const message = await context.core.chat.sendMessage(room.id, bob.user.id, 'Bob wrote this');

      aliceSocket.send({ type: 'edit_message', messageId: message.id, content: 'Alice rewrote it' });
      const error = await aliceSocket.waitFor('error');
      expect(error.message).toBe('You can only edit your own messages');
    });
  });
});

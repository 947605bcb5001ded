import type { Entity, Timestamp } from './common.js';

export type RoomType = 'direct' | 'project' | 'group';
export type MessageType = 'text' | 'image' | 'file' | 'system';
export type MembershipRole = 'member' | 'admin' | 'owner';

export interface ChatRoom extends Entity {
  name: string;
  roomType: RoomType;
  participantIds: string[];
  projectId?: string;
  isActive: boolean;
  createdById: string;
}

export interface ReadReceipt {
  userId: string;
  readAt: Timestamp;
}

export interface Message extends Entity {
  roomId: string;
  /** null for system messages */
  senderId: string | null;
  messageType: MessageType;
  content: string;
  fileUrl?: string;
  fileName?: string;
  isEdited: boolean;
  editedAt?: Timestamp;
  replyToId?: string;
  readBy: ReadReceipt[];
}

export interface ChatMembership extends Entity {
  roomId: string;
  userId: string;
  role: MembershipRole;
  joinedAt: Timestamp;
  lastSeenAt?: Timestamp;
  isMuted: boolean;
  isPinned: boolean;
}

/**
 * Message as broadcast over REST and the socket gateway
 */
export interface MessagePayload {
  id: string;
  roomId: string;
  content: string;
  sender: { id: string; name: string; avatar: string | null } | null;
  messageType: MessageType;
  fileUrl: string | null;
  fileName: string | null;
  replyTo: { id: string; content: string; senderName: string } | null;
  isEdited: boolean;
  editedAt: Timestamp | null;
  createdAt: Timestamp;
}

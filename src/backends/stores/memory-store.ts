/**
 * In-memory Conversation Store
 * Conversations and messages with numeric ids, kept for the life of the process
 */

import type { ChatMessage, Conversation } from '../../../shared/types';
import type { ConversationStore } from '../../types';

export interface ConversationSnapshot {
  nextConversationId: number;
  nextMessageId: number;
  conversations: Conversation[];
  messages: ChatMessage[];
}

export function emptySnapshot(): ConversationSnapshot {
  return { nextConversationId: 1, nextMessageId: 1, conversations: [], messages: [] };
}

export class InMemoryConversationStore implements ConversationStore {
  protected data: ConversationSnapshot;

  constructor(snapshot: ConversationSnapshot = emptySnapshot()) {
    this.data = snapshot;
  }

  async createConversation(title: string): Promise<Conversation> {
    const now = Date.now();
    const conversation: Conversation = {
      id: this.data.nextConversationId++,
      title,
      createdAt: now,
      lastModified: now,
    };
    this.data.conversations.push(conversation);
    await this.changed();
    return { ...conversation };
  }

  async getConversation(id: number): Promise<Conversation | null> {
    const conversation = this.data.conversations.find((c) => c.id === id);
    return conversation ? { ...conversation } : null;
  }

  /** Most recently modified first */
  async listConversations(): Promise<Conversation[]> {
    return this.data.conversations
      .map((c) => ({ ...c }))
      .sort((a, b) => b.lastModified - a.lastModified);
  }

  async updateConversation(conversation: Conversation): Promise<void> {
    const index = this.data.conversations.findIndex((c) => c.id === conversation.id);
    if (index === -1) {
      throw new Error(`Conversation ${conversation.id} not found`);
    }
    this.data.conversations[index] = { ...conversation };
    await this.changed();
  }

  async getMessages(conversationId: number): Promise<ChatMessage[]> {
    return this.data.messages
      .filter((m) => m.conversationId === conversationId)
      .map((m) => ({ ...m }));
  }

  async createMessage(message: ChatMessage): Promise<number> {
    if (!this.data.conversations.some((c) => c.id === message.conversationId)) {
      throw new Error(`Conversation ${message.conversationId} not found`);
    }
    const id = this.data.nextMessageId++;
    this.data.messages.push({ ...message, id });
    await this.changed();
    return id;
  }

  /** Called after every mutation */
  protected async changed(): Promise<void> {}
}

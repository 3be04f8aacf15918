/**
 * JSON-file Conversation Store
 * Same behaviour as the in-memory store, written through to one JSON file.
 */

import { existsSync, readFileSync } from 'fs';
import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { ChatMessage, Conversation, MessageRole } from '../../../shared/types';
import { InMemoryConversationStore, emptySnapshot, type ConversationSnapshot } from './memory-store';

const ROLES: readonly MessageRole[] = ['system', 'user', 'assistant'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConversation(value: unknown): value is Conversation {
  return isRecord(value)
    && typeof value.id === 'number'
    && typeof value.title === 'string'
    && typeof value.createdAt === 'number'
    && typeof value.lastModified === 'number';
}

function isChatMessage(value: unknown): value is ChatMessage {
  if (!isRecord(value)) return false;
  const { role } = value;
  return typeof value.conversationId === 'number'
    && ROLES.some((known) => known === role)
    && typeof value.content === 'string'
    && typeof value.timestamp === 'number';
}

export function parseSnapshot(text: string, source: string): ConversationSnapshot {
  const json: unknown = JSON.parse(text);
  if (
    !isRecord(json) ||
    typeof json.nextConversationId !== 'number' ||
    typeof json.nextMessageId !== 'number' ||
    !Array.isArray(json.conversations) ||
    !Array.isArray(json.messages)
  ) {
    throw new Error(`Invalid conversation database: ${source}`);
  }

  return {
    nextConversationId: json.nextConversationId,
    nextMessageId: json.nextMessageId,
    conversations: json.conversations.filter(isConversation),
    messages: json.messages.filter(isChatMessage),
  };
}

export class FileConversationStore extends InMemoryConversationStore {
  private path: string;
  private writing: Promise<void> = Promise.resolve();

  constructor(path: string) {
    super(existsSync(path) ? parseSnapshot(readFileSync(path, 'utf-8'), path) : emptySnapshot());
    this.path = path;
  }

  /** Writes are serialized; each one replaces the file atomically */
  protected override changed(): Promise<void> {
    const contents = JSON.stringify(this.data, null, 2);
    const next = this.writing.then(() => this.write(contents));
    // A failed write must not block the ones queued after it
    this.writing = next.catch(() => undefined);
    return next;
  }

  private async write(contents: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tempPath = `${this.path}.tmp`;
    await writeFile(tempPath, contents, 'utf-8');
    await rename(tempPath, this.path);
  }
}

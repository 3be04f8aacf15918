/**
 * Data directory utilities for assistant-pipeline
 * Conversations and recordings are stored in ~/.cache/assistant-pipeline/ by default
 */

import { homedir } from 'os';
import { join } from 'path';

/**
 * Get the data directory.
 * Default: ~/.cache/assistant-pipeline
 * Override with ASSISTANT_DATA_DIR environment variable.
 */
export function getDataDir(): string {
  return process.env.ASSISTANT_DATA_DIR || join(homedir(), '.cache', 'assistant-pipeline');
}

/**
 * Get the path to the recordings directory
 */
export function getRecordingsDir(): string {
  return join(getDataDir(), 'recordings');
}

/**
 * Get the path of the JSON conversation database
 */
export function getConversationsFile(): string {
  return join(getDataDir(), 'conversations.json');
}

/**
 * Assistant Logger Service
 *
 * Structured, console-backed logging for the assistant pipeline.
 * Components emit structured events, the logger handles all formatting.
 */

import type { ProcessingState } from '../../shared/types';

// ============================================================================
// Structured Log Events
// ============================================================================

export type AssistantLogEvent =
  | { type: 'state'; from: ProcessingState; to: ProcessingState }
  | { type: 'user'; content: string }
  | { type: 'stream_start'; transcript?: string }
  | { type: 'chunk'; text: string }
  | { type: 'response'; content: string }
  | { type: 'command'; target: string; command: string; ok: boolean }
  | { type: 'debug'; message: string }
  | { type: 'info'; message: string }
  | { type: 'warn'; message: string }
  | { type: 'error'; message: string };

export interface AssistantLoggerOptions {
  enabled?: boolean;
  /** Print debug-level events (chunks, speech queue) */
  debug?: boolean;
  /** Line sink, defaults to console */
  write?: (line: string, level: 'log' | 'warn' | 'error') => void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Formats and displays structured assistant log events
 * All formatting (colors, icons, layout) is centralized here
 */
export class AssistantLogger {
  private static readonly COLORS = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    cyan: '\x1b[36m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    blue: '\x1b[34m',
    red: '\x1b[31m',
  };

  private static readonly ICONS = {
    state: '⚙',
    user: '👤',
    stream: '📡',
    response: '💬',
    command: '🔧',
    ok: '✓',
    error: '✗',
    arrow: '→',
  };

  private enabled: boolean;
  private debugEnabled: boolean;
  private write: (line: string, level: 'log' | 'warn' | 'error') => void;

  constructor(options: AssistantLoggerOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.debugEnabled = options.debug ?? false;
    this.write = options.write ?? ((line, level) => console[level](line));
  }

  /**
   * Log a structured event
   */
  log(event: AssistantLogEvent): void {
    if (!this.enabled) return;

    const { COLORS: C, ICONS } = AssistantLogger;

    switch (event.type) {
      case 'state':
        this.write(`${ICONS.state} ${C.dim}${event.from} ${ICONS.arrow} ${event.to}${C.reset}`, 'log');
        break;

      case 'user':
        this.write(`${ICONS.user} ${C.yellow}USER${C.reset}: ${event.content}`, 'log');
        break;

      case 'stream_start':
        if (event.transcript) {
          this.write(`${ICONS.stream} ${C.cyan}GENERATING${C.reset} ${C.dim}(transcript: ${event.transcript})${C.reset}`, 'log');
        } else {
          this.write(`${ICONS.stream} ${C.cyan}GENERATING${C.reset}`, 'log');
        }
        break;

      case 'chunk':
        if (this.debugEnabled) {
          this.write(`${C.dim}  ${ICONS.arrow} ${JSON.stringify(event.text)}${C.reset}`, 'log');
        }
        break;

      case 'response':
        this.write(`${ICONS.response} ${C.green}ASSISTANT${C.reset}: ${event.content}`, 'log');
        break;

      case 'command': {
        const mark = event.ok ? `${C.green}${ICONS.ok}` : `${C.red}${ICONS.error}`;
        this.write(
          `${ICONS.command} ${C.blue}${event.target}${C.reset} ${ICONS.arrow} ${event.command} ${mark}${C.reset}`,
          event.ok ? 'log' : 'warn'
        );
        break;
      }

      case 'debug':
        if (this.debugEnabled) {
          this.write(`${C.dim}${event.message}${C.reset}`, 'log');
        }
        break;

      case 'info':
        this.write(event.message, 'log');
        break;

      case 'warn':
        this.write(`${C.yellow}${event.message}${C.reset}`, 'warn');
        break;

      case 'error':
        this.write(`${ICONS.error} ${C.red}ERROR${C.reset}: ${event.message}`, 'error');
        break;
    }
  }

  debug(message: string): void {
    this.log({ type: 'debug', message });
  }

  info(message: string): void {
    this.log({ type: 'info', message });
  }

  warn(message: string): void {
    this.log({ type: 'warn', message });
  }

  error(message: string): void {
    this.log({ type: 'error', message });
  }

  /**
   * Enable or disable logging
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }
}

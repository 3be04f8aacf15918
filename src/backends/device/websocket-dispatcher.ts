/**
 * Device Command Dispatcher
 *
 * Forwards device-control commands to the peripheral bridge over WebSocket.
 * The bridge owns the Bluetooth link; this side sends one command and waits
 * for its acknowledgement. One attempt per command, no retry.
 *
 * Bridge protocol (JSON text frames):
 *   → { "type": "command", "id": "cmd_1_...", "mac": "AA:BB:...", "data": "LED_ON\n" }
 *   ← { "type": "ack", "id": "cmd_1_...", "ok": true, "message"?: "..." }
 */

import { WebSocket } from 'ws';
import { hasError, isDeviceControl, type AssistantResponse } from '../../../shared/protocol';
import type { CommandDispatcher } from '../../types';
import type { AssistantLogger } from '../../services/assistant-logger';
import { toError } from '../../errors';

const MAC_PATTERN = /MAC:\s*([A-F0-9:]{17})/i;

export interface DeviceCommand {
  mac: string;
  /** Command text including the trailing newline */
  data: string;
}

export interface BridgeCommandMessage extends DeviceCommand {
  type: 'command';
  id: string;
}

export interface BridgeAckMessage {
  type: 'ack';
  id?: string;
  ok: boolean;
  message?: string;
}

export interface WebSocketDispatcherConfig {
  url: string;
  ackTimeoutMs?: number;
  logger?: AssistantLogger;
}

/** `"Robot Arm (MAC: AA:BB:CC:DD:EE:FF)"` → `"AA:BB:CC:DD:EE:FF"` */
export function extractMacAddress(targetDevice: string): string | null {
  const match = MAC_PATTERN.exec(targetDevice);
  return match ? match[1].toUpperCase() : null;
}

/**
 * Build the command for a device-control response.
 * Null when the response must not be dispatched.
 */
export function prepareDeviceCommand(response: AssistantResponse): DeviceCommand | null {
  if (!isDeviceControl(response) || hasError(response)) return null;

  const mac = extractMacAddress(response.targetDevice);
  if (!mac) return null;

  const command = response.output.generatedOutput.trim();
  if (!command || command.startsWith('ERROR:')) return null;

  return { mac, data: `${command}\n` };
}

function isAckMessage(value: unknown): value is BridgeAckMessage {
  return typeof value === 'object'
    && value !== null
    && 'type' in value
    && value.type === 'ack'
    && 'ok' in value
    && typeof value.ok === 'boolean';
}

export class WebSocketCommandDispatcher implements CommandDispatcher {
  private config: Required<Omit<WebSocketDispatcherConfig, 'logger'>>;
  private logger?: AssistantLogger;
  private commandCounter = 0;

  constructor(config: WebSocketDispatcherConfig) {
    this.config = {
      ackTimeoutMs: 5000,
      ...config,
    };
    this.logger = config.logger;
  }

  async route(response: AssistantResponse): Promise<boolean> {
    const command = prepareDeviceCommand(response);
    if (!command) {
      this.logger?.warn(`Not dispatching command for ${response.targetDevice || 'unknown device'}`);
      return false;
    }

    try {
      return await this.send(command);
    } catch (error) {
      this.logger?.error(`Device bridge error: ${toError(error).message}`);
      return false;
    }
  }

  private send(command: DeviceCommand): Promise<boolean> {
    const message: BridgeCommandMessage = {
      type: 'command',
      id: `cmd_${++this.commandCounter}_${Date.now()}`,
      ...command,
    };

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.config.url);
      let settled = false;

      const finish = (result: boolean | Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        ws.removeAllListeners();
        // Keep a no-op error listener so a late socket error is not thrown
        ws.on('error', () => undefined);
        if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
          ws.terminate();
        }
        if (result instanceof Error) reject(result);
        else resolve(result);
      };

      const timer = setTimeout(() => {
        this.logger?.warn(`No acknowledgement for ${message.id} within ${this.config.ackTimeoutMs}ms`);
        finish(false);
      }, this.config.ackTimeoutMs);

      ws.on('open', () => {
        ws.send(JSON.stringify(message));
      });

      ws.on('message', (data) => {
        let parsed: unknown;
        try {
          parsed = JSON.parse(data.toString());
        } catch {
          this.logger?.warn('Ignoring malformed bridge message');
          return;
        }
        if (!isAckMessage(parsed)) return;
        if (parsed.id !== undefined && parsed.id !== message.id) return;

        if (!parsed.ok && parsed.message) {
          this.logger?.warn(`Bridge rejected command: ${parsed.message}`);
        }
        finish(parsed.ok);
      });

      ws.on('close', () => finish(new Error('Bridge closed the connection before acknowledging')));
      ws.on('error', (error) => finish(error));
    });
  }
}

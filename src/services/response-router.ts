/**
 * Response Router
 * Picks the single handling path for one assistant result
 */

import {
  hasError,
  isDeviceControl,
  type AssistantResponse,
  type AssistantResult,
} from '../../shared/protocol';
import type { CommandDispatcher, Notifier } from '../types';
import type { AssistantLogger } from './assistant-logger';
import type { StreamEventDecoder, StreamEventHandlers, StreamOutcome } from './stream-event-decoder';
import { toError } from '../errors';

export const UNEXPECTED_RESPONSE_MESSAGE = 'Unexpected response from server';
export const COMMAND_FAILED_MESSAGE = 'Failed to send command';

export type RouteOutcome =
  | { path: 'stream'; outcome: StreamOutcome }
  | { path: 'device'; sent: boolean }
  | { path: 'device-error'; message: string }
  | { path: 'error'; message: string }
  | { path: 'unexpected' };

/** Per-run hooks supplied by the controller */
export interface RouteContext {
  handlers: StreamEventHandlers;
  signal?: AbortSignal;
  /** Return the pipeline to idle once a non-streaming path is finished */
  finish(): void;
}

export interface ResponseRouterOptions {
  decoder: StreamEventDecoder;
  dispatcher: CommandDispatcher;
  notifier: Notifier;
  logger?: AssistantLogger;
  /** Duration of the command sent/failed notice */
  commandNoticeMs?: number;
}

export class ResponseRouter {
  private decoder: StreamEventDecoder;
  private dispatcher: CommandDispatcher;
  private notifier: Notifier;
  private logger?: AssistantLogger;
  private commandNoticeMs: number;

  constructor(options: ResponseRouterOptions) {
    this.decoder = options.decoder;
    this.dispatcher = options.dispatcher;
    this.notifier = options.notifier;
    this.logger = options.logger;
    this.commandNoticeMs = options.commandNoticeMs ?? 1000;
  }

  async route(result: AssistantResult, context: RouteContext): Promise<RouteOutcome> {
    switch (result.kind) {
      case 'streaming': {
        const outcome = await this.decoder.consume(result.events, context.handlers, context.signal);
        return { path: 'stream', outcome };
      }

      case 'structured':
        if (isDeviceControl(result.response)) {
          return this.routeDeviceControl(result.response, context);
        }
        break;

      case 'error':
        this.logger?.error(result.message);
        this.notifier.notify(result.message);
        context.finish();
        return { path: 'error', message: result.message };
    }

    this.logger?.error(`${UNEXPECTED_RESPONSE_MESSAGE}: ${describe(result)}`);
    this.notifier.notify(UNEXPECTED_RESPONSE_MESSAGE);
    context.finish();
    return { path: 'unexpected' };
  }

  private async routeDeviceControl(response: AssistantResponse, context: RouteContext): Promise<RouteOutcome> {
    if (hasError(response)) {
      this.logger?.error(`Device control failed: ${response.error.message}`);
      this.notifier.notify(response.error.message, { durationMs: this.commandNoticeMs });
      context.finish();
      return { path: 'device-error', message: response.error.message };
    }

    const command = response.output.generatedOutput;
    let sent = false;
    try {
      sent = await this.dispatcher.route(response);
    } catch (error) {
      this.logger?.error(`Command dispatch threw: ${toError(error).message}`);
    }

    this.logger?.log({ type: 'command', target: response.targetDevice, command, ok: sent });

    // A stop during dispatch already returned the pipeline to idle
    if (!context.signal?.aborted) {
      this.notifier.notify(
        sent ? `Sent to ${response.targetDevice}: ${command}` : COMMAND_FAILED_MESSAGE,
        { durationMs: this.commandNoticeMs }
      );
      context.finish();
    }
    return { path: 'device', sent };
  }
}

function describe(result: AssistantResult): string {
  return result.kind === 'structured' ? `task ${result.response.task}` : result.kind;
}

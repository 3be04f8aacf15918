/**
 * Speech Chunk Player
 *
 * Buffers streamed text fragments and feeds them to a single-utterance
 * synthesizer one at a time. Arrival is network-driven and bursty, playback
 * is strictly sequential, so fragments wait in a FIFO queue until the
 * synthesizer reports that the previous one has finished.
 *
 * Lifecycle of one response:
 *   startStreamMode() → pushChunk()* → endStreamMode() → (drain) → idle
 * forceStop() cuts any of these short.
 */

import type { SpeechSynthesizer } from '../types';
import { TextNormalizer } from './text-normalizer';
import type { AssistantLogger } from './assistant-logger';
import { toError } from '../errors';

export interface SpeechChunkPlayerOptions {
  /** Read on every push; when false, chunks are dropped */
  isEnabled?: () => boolean;
  normalizer?: TextNormalizer;
  logger?: AssistantLogger;
}

export class SpeechChunkPlayer {
  private synth: SpeechSynthesizer;
  private isEnabled: () => boolean;
  private normalizer: TextNormalizer;
  private logger?: AssistantLogger;

  private queue: string[] = [];
  private _streamModeActive = false;
  private _stopWhenDrained = false;
  private _isProcessingQueue = false;

  constructor(synth: SpeechSynthesizer, options: SpeechChunkPlayerOptions = {}) {
    this.synth = synth;
    this.isEnabled = options.isEnabled ?? (() => true);
    this.normalizer = options.normalizer ?? new TextNormalizer();
    this.logger = options.logger;

    this.synth.setCallbacks({
      onComplete: () => this.handleUtteranceFinished(),
      onError: (error) => {
        this.logger?.warn(`Speech synthesis failed: ${error.message}`);
        this.handleUtteranceFinished();
      },
    });
  }

  // ============ State ============

  get streamModeActive(): boolean {
    return this._streamModeActive;
  }

  get stopWhenDrained(): boolean {
    return this._stopWhenDrained;
  }

  get isProcessingQueue(): boolean {
    return this._isProcessingQueue;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  // ============ Stream Control ============

  /** Reset buffer and flags before the first chunk of a new response */
  startStreamMode(): void {
    this.queue = [];
    this._stopWhenDrained = false;
    this._isProcessingQueue = false;
    this._streamModeActive = true;
    this.logger?.debug('[speech] stream mode started');
  }

  pushChunk(text: string): void {
    if (!this.isEnabled()) return;

    let cleaned: string;
    try {
      cleaned = this.normalizer.normalize(text);
    } catch (error) {
      // Only this chunk goes unspoken
      this.logger?.warn(`Speech text normalization failed: ${toError(error).message}`);
      return;
    }
    if (!cleaned) return;

    this.queue.push(cleaned);

    if (!this._isProcessingQueue && !this.synth.speaking) {
      this.playNext();
    }
  }

  /** Finish what is queued, then stop */
  endStreamMode(): void {
    this._stopWhenDrained = true;
    this.logger?.debug(`[speech] stream ended, ${this.queue.length} chunk(s) left`);

    // Nothing queued or in flight: the drain is already complete
    if (!this._isProcessingQueue && this.queue.length === 0) {
      this.reset();
    }
  }

  /** Stop immediately and drop everything queued */
  forceStop(): void {
    this.reset();
    this.synth.stop();
    this.logger?.debug('[speech] force stopped');
  }

  // ============ Playback Cycle ============

  private playNext(): void {
    const next = this.queue.shift();
    if (next === undefined) return;

    this._isProcessingQueue = true;
    this.synth.speak(next).catch((error: unknown) => {
      this.logger?.warn(`Speech synthesis failed: ${toError(error).message}`);
      this.handleUtteranceFinished();
    });
  }

  private handleUtteranceFinished(): void {
    // An utterance this player did not start, or one dropped by forceStop
    if (!this._isProcessingQueue) {
      if (this.queue.length > 0) this.playNext();
      return;
    }

    this._isProcessingQueue = false;

    if (this.queue.length > 0) {
      this.playNext();
    } else if (this._stopWhenDrained) {
      this.reset();
    }
  }

  private reset(): void {
    this.queue = [];
    this._streamModeActive = false;
    this._stopWhenDrained = false;
    this._isProcessingQueue = false;
  }
}

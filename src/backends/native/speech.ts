/**
 * Command-line Speech Synthesizer (Native)
 * Speaks through espeak-ng (or any binary taking the same flags).
 */

import { spawn, type ChildProcess } from 'child_process';
import type { SpeechSynthesizer, SpeechSynthesizerCallbacks } from '../../types';

export interface CommandSynthesizerConfig {
  binary: string;
  /** Words per minute */
  rate: number;
  /** 0-99 */
  pitch: number;
  /** 0-200 */
  volume: number;
  voice?: string;
}

export function buildSpeechArgs(config: CommandSynthesizerConfig, text: string): string[] {
  const args = [
    '-s', String(config.rate),
    '-p', String(config.pitch),
    '-a', String(config.volume),
  ];
  if (config.voice) args.push('-v', config.voice);
  // End of options: text may start with a dash
  args.push('--', text);
  return args;
}

export class CommandSpeechSynthesizer implements SpeechSynthesizer {
  private config: CommandSynthesizerConfig;
  private callbacks: SpeechSynthesizerCallbacks = {};
  private current: ChildProcess | null = null;

  constructor(config: CommandSynthesizerConfig) {
    this.config = config;
  }

  get speaking(): boolean {
    return this.current !== null;
  }

  setCallbacks(callbacks: SpeechSynthesizerCallbacks): void {
    this.callbacks = callbacks;
  }

  /**
   * Start speaking `text`. Resolves once the process is running (or failed
   * to start); completion and failures arrive through the callbacks.
   */
  speak(text: string): Promise<void> {
    if (this.current) this.stop();

    const child = spawn(this.config.binary, buildSpeechArgs(this.config, text), {
      stdio: ['ignore', 'ignore', 'pipe'],
    });
    this.current = child;

    let stderr = '';
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.once('close', (code, signal) => {
      // stop() already detached this utterance and reported onCancel
      if (this.current !== child) return;
      this.current = null;

      if (code === 0) {
        this.callbacks.onComplete?.();
      } else {
        const detail = stderr.trim() || `exit code ${code ?? signal}`;
        this.callbacks.onError?.(new Error(`${this.config.binary} failed: ${detail}`));
      }
    });

    return new Promise((resolve) => {
      child.once('spawn', () => {
        this.callbacks.onStart?.();
        resolve();
      });
      child.once('error', (error) => {
        if (this.current === child) {
          this.current = null;
          this.callbacks.onError?.(error);
        }
        resolve();
      });
    });
  }

  /** Stop the current utterance. No onComplete follows for it. */
  stop(): void {
    const child = this.current;
    if (!child) return;

    this.current = null;
    child.kill('SIGTERM');
    this.callbacks.onCancel?.();
  }
}

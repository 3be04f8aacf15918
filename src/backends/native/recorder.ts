/**
 * ffmpeg Capture Service (Native)
 * Records the default microphone to a 16 kHz mono WAV file.
 * Requires an ffmpeg binary on PATH.
 */

import { spawn, type ChildProcess } from 'child_process';
import { existsSync, mkdirSync, statSync } from 'fs';
import { rm } from 'fs/promises';
import { join } from 'path';
import type { CaptureArtifact, CaptureService } from '../../types';
import type { AssistantLogger } from '../../services/assistant-logger';

const START_STABILITY_DELAY_MS = 300;
const WAV_HEADER_BYTES = 44;

export interface FfmpegRecorderConfig {
  outputDir: string;
  /** ffmpeg input format: pulse, alsa, avfoundation, dshow */
  inputFormat: string;
  inputDevice: string;
  sampleRate?: number;
  binary?: string;
  logger?: AssistantLogger;
}

export function buildFfmpegArgs(config: FfmpegRecorderConfig, outputPath: string): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-f', config.inputFormat,
    '-i', config.inputDevice,
    '-ac', '1',
    '-ar', String(config.sampleRate ?? 16000),
    '-acodec', 'pcm_s16le',
    '-y',
    outputPath,
  ];
}

/** Map ffmpeg stderr to a short reason */
export function describeCaptureFailure(stderr: string): string {
  const detail = stderr.trim();
  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'microphone permission denied';
  }
  if (/Input\/output error|No such file|device not found|could not find/i.test(detail)) {
    return 'microphone input device is unavailable';
  }
  return detail || 'ffmpeg exited before recording started';
}

export class FfmpegRecorder implements CaptureService {
  private config: FfmpegRecorderConfig;
  private process: ChildProcess | null = null;
  private outputPath: string | null = null;

  constructor(config: FfmpegRecorderConfig) {
    this.config = config;
  }

  isRecording(): boolean {
    return this.process !== null;
  }

  async start(): Promise<boolean> {
    if (this.process) return false;

    mkdirSync(this.config.outputDir, { recursive: true });
    const outputPath = join(this.config.outputDir, `recording-${Date.now()}.wav`);
    const ffmpeg = spawn(this.config.binary ?? 'ffmpeg', buildFfmpegArgs(this.config, outputPath), {
      stdio: ['ignore', 'ignore', 'pipe'],
    });

    let stderr = '';
    ffmpeg.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    const started = await new Promise<boolean>((resolve) => {
      let settled = false;
      const settle = (value: boolean, reason?: string) => {
        if (settled) return;
        settled = true;
        if (reason) this.config.logger?.warn(`Recording failed to start: ${reason}`);
        resolve(value);
      };

      ffmpeg.once('error', (error) => settle(false, error.message));
      ffmpeg.once('close', () => settle(false, describeCaptureFailure(stderr)));
      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (ffmpeg.exitCode !== null) {
            settle(false, describeCaptureFailure(stderr));
          } else {
            settle(true);
          }
        }, START_STABILITY_DELAY_MS);
      });
    });

    if (!started) {
      await this.removeFile(outputPath);
      return false;
    }

    ffmpeg.once('close', () => {
      if (this.process === ffmpeg) this.process = null;
    });
    this.process = ffmpeg;
    this.outputPath = outputPath;
    this.config.logger?.debug(`Recording to ${outputPath}`);
    return true;
  }

  async stop(): Promise<CaptureArtifact | null> {
    const current = this.process;
    const outputPath = this.outputPath;
    this.process = null;
    this.outputPath = null;
    if (!current || !outputPath) return null;

    // SIGINT lets ffmpeg finish the WAV header
    const code = await this.terminate(current, 'SIGINT');
    if (code !== 0 && code !== 255) {
      this.config.logger?.warn(`ffmpeg exited with code ${code}`);
    }

    if (!existsSync(outputPath) || statSync(outputPath).size <= WAV_HEADER_BYTES) {
      await this.removeFile(outputPath);
      return null;
    }
    return outputPath;
  }

  async cancel(): Promise<void> {
    const current = this.process;
    const outputPath = this.outputPath;
    this.process = null;
    this.outputPath = null;

    if (current) await this.terminate(current, 'SIGKILL');
    if (outputPath) await this.removeFile(outputPath);
  }

  async discard(artifact: CaptureArtifact): Promise<void> {
    await this.removeFile(artifact);
  }

  private terminate(child: ChildProcess, signal: NodeJS.Signals): Promise<number | null> {
    if (child.exitCode !== null) return Promise.resolve(child.exitCode);

    return new Promise((resolve) => {
      child.once('close', (code) => resolve(code));
      child.kill(signal);
    });
  }

  private async removeFile(path: string): Promise<void> {
    await rm(path, { force: true });
  }
}

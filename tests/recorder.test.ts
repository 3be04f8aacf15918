import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FfmpegRecorder, buildFfmpegArgs, describeCaptureFailure } from '../src/backends/native/recorder';

const config = { outputDir: '/tmp/recordings', inputFormat: 'pulse', inputDevice: 'default' };

describe('buildFfmpegArgs', () => {
  it('records mono 16 kHz PCM by default', () => {
    expect(buildFfmpegArgs(config, '/tmp/recordings/a.wav')).toEqual([
      '-hide_banner',
      '-loglevel', 'error',
      '-f', 'pulse',
      '-i', 'default',
      '-ac', '1',
      '-ar', '16000',
      '-acodec', 'pcm_s16le',
      '-y',
      '/tmp/recordings/a.wav',
    ]);
  });
});

describe('describeCaptureFailure', () => {
  it('names the likely cause', () => {
    expect(describeCaptureFailure('avfoundation: Operation not permitted')).toBe('microphone permission denied');
    expect(describeCaptureFailure('default: No such file or directory')).toBe('microphone input device is unavailable');
    expect(describeCaptureFailure('  ')).toBe('ffmpeg exited before recording started');
  });
});

describe('FfmpegRecorder.discard', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'recorder-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('removes a finished recording', async () => {
    const path = join(dir, 'recording-1.wav');
    await writeFile(path, Buffer.from('RIFF-test-audio'));
    const recorder = new FfmpegRecorder({ ...config, outputDir: dir });

    await recorder.discard(path);

    expect(existsSync(path)).toBe(false);
  });

  it('ignores a recording that is already gone', async () => {
    const recorder = new FfmpegRecorder({ ...config, outputDir: dir });

    await expect(recorder.discard(join(dir, 'missing.wav'))).resolves.toBeUndefined();
  });
});

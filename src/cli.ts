#!/usr/bin/env node
/**
 * Assistant Pipeline CLI
 *
 * Usage:
 *   assistant-pipeline chat [--conversation <id>]   - Interactive chat
 *   assistant-pipeline list                         - List saved conversations
 *   assistant-pipeline health                       - Check the assistant server
 *   assistant-pipeline help                         - Show help
 */

import { createInterface } from 'readline';
import { config } from './config';
import { getConversationsFile } from './cache';
import { createAssistantClient } from './assistant-client';
import { FileConversationStore } from './backends/stores/file-store';

// ============ Argument Parsing ============

function parseConversationId(args: string[]): number | undefined {
  const index = args.indexOf('--conversation');
  if (index === -1) return undefined;

  const value = Number(args[index + 1]);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error('--conversation expects a positive integer id');
  }
  return value;
}

// ============ Commands ============

async function chat(conversationId: number | undefined): Promise<void> {
  const client = createAssistantClient(config, {
    callbacks: {
      onResponseChunk: (text) => process.stdout.write(text),
      onConversationTitled: (title) => client.logger.info(`Conversation: ${title}`),
    },
  });
  const { controller, preferences, logger } = client;

  controller.onStateChange((state, previous) => {
    // Terminate the streamed reply line
    if (previous === 'processing' && state === 'idle') process.stdout.write('\n');
  });

  const conversation = await controller.initialize({ conversationId });
  logger.info(`Conversation #${conversation.id}: ${conversation.title}`);
  for (const message of controller.messages) {
    logger.info(`  ${message.role}: ${message.content}`);
  }
  logger.info('Type a message, or /rec, /stop, /tts, /quit');

  const rl = createInterface({ input: process.stdin, output: process.stdout });

  const handleLine = async (line: string): Promise<boolean> => {
    const input = line.trim();

    switch (input) {
      case '/quit':
      case '/exit':
        await controller.stopProcessing();
        return false;

      case '/rec':
        if (controller.state === 'recording') {
          await controller.stopRecording();
        } else {
          await controller.startRecording();
          if (controller.state === 'recording') logger.info('Recording... type /rec again to send');
        }
        return true;

      case '/stop':
        await controller.stopProcessing();
        return true;

      case '/tts':
        preferences.ttsEnabled = !preferences.ttsEnabled;
        logger.info(`Speech ${preferences.ttsEnabled ? 'enabled' : 'disabled'}`);
        return true;

      case '':
        return true;

      default:
        if (controller.state !== 'idle') {
          logger.warn(`Busy (${controller.stateLabel}), type /stop to cancel`);
          return true;
        }
        await controller.sendTextMessage(input);
        return true;
    }
  };

  // Lines are handled one at a time; /stop must not wait behind a running
  // reply, so replies are not awaited before the next line is read.
  let running: Promise<void> = Promise.resolve();
  rl.on('line', (line) => {
    const input = line.trim();
    const task = async () => {
      if (!(await handleLine(line))) rl.close();
    };

    if (input === '/stop' || input === '/quit' || input === '/exit') {
      task().catch((err: unknown) => logger.error(String(err)));
    } else {
      running = running.then(task).catch((err: unknown) => logger.error(String(err)));
    }
  });

  await new Promise<void>((resolve) => rl.once('close', () => resolve()));
  await controller.stopProcessing();
}

async function list(): Promise<void> {
  const store = new FileConversationStore(getConversationsFile());
  const conversations = await store.listConversations();

  if (conversations.length === 0) {
    console.log('No conversations yet.');
    return;
  }
  for (const conversation of conversations) {
    const modified = new Date(conversation.lastModified).toLocaleString();
    console.log(`  #${conversation.id}  ${conversation.title}  (${modified})`);
  }
}

async function health(): Promise<void> {
  const { api } = createAssistantClient(config);
  const healthy = await api.checkHealth();

  console.log(healthy
    ? `✓ ${config.server.baseUrl} is healthy`
    : `✗ ${config.server.baseUrl} is not reachable or not healthy`);
  if (!healthy) process.exitCode = 1;
}

function printHelp(): void {
  console.log(`
assistant-pipeline - Voice/text assistant client

Commands:
  chat [--conversation <id>]   Start chatting (resumes a conversation when an id is given)
  list                         List saved conversations
  health                       Check that the assistant server is reachable
  help                         Show this help message

Chat commands:
  <text>    Send a message
  /rec      Start recording, /rec again to stop and send
  /stop     Stop the current reply (partial text is kept)
  /tts      Toggle spoken replies
  /quit     Exit

Environment:
  ASSISTANT_SERVER_URL          Assistant server (default: http://localhost:5000)
  ASSISTANT_STT_MODEL           Transcription model (default: small)
  ASSISTANT_LM_MODEL            Generation model (default: gemini-2.5-flash)
  ASSISTANT_TTS_ENABLED         Speak replies (default: 1)
  ASSISTANT_TTS_BINARY          Speech synthesizer (default: espeak-ng)
  ASSISTANT_DEVICE_BRIDGE_URL   Peripheral bridge (default: ws://localhost:8765)
  ASSISTANT_FFMPEG_INPUT        Microphone input for ffmpeg (default: default)
  ASSISTANT_DATA_DIR            Data directory (default: ~/.cache/assistant-pipeline)
  ASSISTANT_DEBUG               Verbose logging (1 to enable)
`);
}

// ============ Main ============

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case 'chat':
      await chat(parseConversationId(args));
      break;

    case 'list':
      await list();
      break;

    case 'health':
      await health();
      break;

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      printHelp();
      break;

    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exit(1);
  }
}

main().catch((err) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});

#!/usr/bin/env node

import fs from 'fs';
import path from 'path';
import { createInterface } from 'readline';
import { startServer } from './api/server.js';
import { createServices, createTranscriber, type DictationServices } from './bootstrap.js';
import { assertApiKey, loadSettings } from './config/settings.js';
import { acquireInstanceLock, type InstanceLock } from './services/InstanceLock.js';

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === '--help') {
    printUsage();
    return;
  }

  const settings = loadSettings();

  if (args[0] === '--check-key') {
    await checkKey(settings);
    return;
  }

  assertApiKey(settings);

  if (args[0] === '--transcribe') {
    if (!args[1]) {
      printUsage();
      process.exitCode = 1;
      return;
    }
    await transcribeFile(createServices(settings), args[1]);
    return;
  }

  const lock = acquireInstanceLock();
  if (!lock) {
    console.error('Another instance is already running');
    process.exitCode = 1;
    return;
  }

  const services = createServices(settings);
  printBanner(services);

  if (args[0] === '--cli') {
    await startCLI(services, lock);
  } else {
    await startDaemon(services, lock);
  }
}

function printUsage() {
  console.log('Usage:');
  console.log('  push-to-dictate                     - Start the hotkey bridge server');
  console.log('  push-to-dictate --cli               - Drive sessions from the terminal (down / up)');
  console.log('  push-to-dictate --transcribe <file> - Transcribe and correct an audio file');
  console.log('  push-to-dictate --check-key         - Verify the configured API key');
}

function printBanner({ settings, corrector }: DictationServices) {
  console.log('='.repeat(50));
  console.log('Push-to-dictate ready');
  console.log(`  Provider: ${settings.provider} (${settings.model})`);
  console.log(`  Hotkey:   hold ${settings.hotkey.toUpperCase()} to speak, release to paste`);
  console.log(`  Language: ${settings.language || 'auto'}`);
  console.log(`  Rules:    ${corrector.ruleCount}`);
  console.log('='.repeat(50));
}

async function startDaemon(services: DictationServices, lock: InstanceLock) {
  const { settings, controller, statusBoard, transcriber } = services;
  const server = await startServer({
    controller,
    statusBoard,
    hotkey: settings.hotkey,
    maxUploadBytes: transcriber.maxPayloadBytes,
  }, settings.port);

  const shutdown = () => {
    console.log('Shutting down');
    statusBoard.dispose();
    lock.release();
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function startCLI(services: DictationServices, lock: InstanceLock) {
  const { controller, statusBoard } = services;

  console.log('Commands:');
  console.log('  down   - Hotkey pressed (start recording)');
  console.log('  up     - Hotkey released (stop, transcribe, paste)');
  console.log('  status - Show the current state');
  console.log('  quit   - Exit CLI');

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  rl.on('close', () => {
    statusBoard.dispose();
    lock.release();
  });

  const prompt = () => {
    rl.question('dictate> ', async (input: string) => {
      const command = input.trim().toLowerCase();

      try {
        switch (command) {
          case 'down': {
            const result = await controller.handleKeyDown();
            if (result.kind === 'ignored') {
              console.log(`Ignored: session is ${result.state}`);
            }
            break;
          }

          case 'up': {
            const outcome = await controller.handleKeyUp();
            if (!outcome) {
              console.log('Ignored: not recording');
            }
            break;
          }

          case 'status': {
            const session = controller.getSession();
            console.log(`State: ${controller.getState()}`);
            if (session) {
              console.log(`Session ${session.id} started ${session.startTime.toISOString()}`);
            }
            console.log(`Last status: ${statusBoard.getSnapshot().status}`);
            break;
          }

          case 'quit':
          case 'exit':
            rl.close();
            return;

          default:
            console.log('Unknown command. Available: down, up, status, quit');
        }
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
      }

      prompt();
    });
  };

  prompt();
}

async function transcribeFile({ controller }: DictationServices, filePath: string) {
  console.log(`Transcribing: ${filePath}`);
  const audio = await fs.promises.readFile(filePath);
  const result = await controller.transcribeAudio(audio, path.basename(filePath));
  console.log('Raw transcript:');
  console.log(result.rawText);
  console.log('Corrected:');
  console.log(result.text);
}

async function checkKey(settings: ReturnType<typeof loadSettings>) {
  try {
    assertApiKey(settings);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
    return;
  }

  const masked = `${settings.apiKey.slice(0, 4)}...(${settings.apiKey.length} chars)`;
  console.log(`Checking ${settings.provider} key ${masked}`);
  await createTranscriber(settings).verifyCredential();
  console.log('API key accepted');
}

main().catch((error: unknown) => {
  console.error('Fatal:', error instanceof Error ? error.message : error);
  process.exit(1);
});

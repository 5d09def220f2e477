import { setTimeout as delay } from 'timers/promises';
import { DictationError } from '../errors/DictationError.js';
import type { DeliveryGateway } from '../types/index.js';
import { runCommand, type CommandRunner } from './CommandRunner.js';

interface PlatformCommands {
  copy: [string, string[]];
  paste: [string, string[]];
}

export interface ClipboardPasteOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  run?: CommandRunner;
  /** Pause between setting the clipboard and sending the paste keystroke. */
  settleMs?: number;
}

export function getPlatformCommands(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): PlatformCommands {
  switch (platform) {
    case 'darwin':
      return {
        copy: ['pbcopy', []],
        paste: ['osascript', ['-e', 'tell application "System Events" to keystroke "v" using command down']],
      };
    case 'win32':
      return {
        copy: ['powershell', ['-NoProfile', '-Command', 'Set-Clipboard -Value ([Console]::In.ReadToEnd())']],
        paste: ['powershell', ['-NoProfile', '-Command', "(New-Object -ComObject WScript.Shell).SendKeys('^v')"]],
      };
    default:
      if (env.WAYLAND_DISPLAY) {
        return {
          copy: ['wl-copy', []],
          paste: ['wtype', ['-M', 'ctrl', 'v', '-m', 'ctrl']],
        };
      }
      return {
        copy: ['xclip', ['-selection', 'clipboard']],
        paste: ['xdotool', ['key', '--clearmodifiers', 'ctrl+v']],
      };
  }
}

/**
 * Delivers text by placing it on the system clipboard and synthesizing the
 * platform's paste shortcut in the focused window.
 */
export class ClipboardPasteGateway implements DeliveryGateway {
  private readonly commands: PlatformCommands;
  private readonly run: CommandRunner;
  private readonly settleMs: number;

  constructor(options: ClipboardPasteOptions = {}) {
    this.commands = getPlatformCommands(options.platform ?? process.platform, options.env ?? process.env);
    this.run = options.run ?? runCommand;
    this.settleMs = options.settleMs ?? 50;
  }

  async deliver(text: string): Promise<void> {
    const [copyCommand, copyArgs] = this.commands.copy;
    const [pasteCommand, pasteArgs] = this.commands.paste;

    try {
      await this.run(copyCommand, copyArgs, { input: text });
    } catch (error) {
      throw new DictationError('delivery-failed', `Could not set clipboard: ${messageOf(error)}`);
    }

    await delay(this.settleMs);

    try {
      await this.run(pasteCommand, pasteArgs);
    } catch (error) {
      throw new DictationError('delivery-failed', `Text copied, but paste failed: ${messageOf(error)}`);
    }
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

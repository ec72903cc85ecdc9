import { spawn } from 'child_process';
import { existsSync } from 'node:fs';
import { extname } from 'node:path';
import type { NotificationKind, TaskOutcome } from '../types/index.js';
import { describeError, NotificationError, ParseError, type ParseResult } from './errors.js';

export const SOUND_EXTENSIONS = ['.mp3', '.wav'] as const;

const APP_TITLE = 'tock';

const KIND_TITLES: Record<NotificationKind, string> = {
  countdown: 'Countdown',
  timer: 'Timer',
  work: 'Pomodoro work',
  pause: 'Pomodoro break',
  event: 'Event',
};

interface CommandSpec {
  cmd: string;
  args: string[];
}

function quoteAppleScript(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function notificationCommand(
  kind: NotificationKind,
  message: string,
  platform: NodeJS.Platform = process.platform
): CommandSpec {
  const title = KIND_TITLES[kind];
  if (platform === 'darwin') {
    return {
      cmd: 'osascript',
      args: [
        '-e',
        `display notification ${quoteAppleScript(message)} with title ${quoteAppleScript(APP_TITLE)} subtitle ${quoteAppleScript(title)}`,
      ],
    };
  }
  return { cmd: 'notify-send', args: ['--app-name', APP_TITLE, title, message] };
}

export function soundCommand(path: string, platform: NodeJS.Platform = process.platform): CommandSpec {
  return platform === 'darwin' ? { cmd: 'afplay', args: [path] } : { cmd: 'paplay', args: [path] };
}

function run({ cmd, args }: CommandSpec): Promise<void> {
  return new Promise((resolve, reject) => {
    const proc = spawn(cmd, args, { stdio: 'ignore' });
    proc.on('close', (code) =>
      code === 0 ? resolve() : reject(new NotificationError(`${cmd} exited with code ${code}`))
    );
    proc.on('error', (error) => reject(new NotificationError(`${cmd} could not be started: ${error.message}`)));
  });
}

async function settle(command: CommandSpec): Promise<TaskOutcome> {
  try {
    await run(command);
    return { ok: true };
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}

/** Shows a desktop notification. Never rejects; failures come back as an outcome. */
export function notify(kind: NotificationKind, message: string): Promise<TaskOutcome> {
  return settle(notificationCommand(kind, message));
}

export function playSound(path: string): Promise<TaskOutcome> {
  return settle(soundCommand(path));
}

export function validateSoundFile(path: string): ParseResult<string> {
  const extension = extname(path).toLowerCase();
  if (!SOUND_EXTENSIONS.some((allowed) => allowed === extension)) {
    return {
      success: false,
      error: new ParseError('invalid-format', `Unsupported sound file '${path}'. Use ${SOUND_EXTENSIONS.join(' or ')}`),
    };
  }
  if (!existsSync(path)) {
    return { success: false, error: new ParseError('invalid-format', `Sound file not found: '${path}'`) };
  }
  return { success: true, data: path };
}

import { spawn } from 'child_process';
import type { Logger } from './logger.js';

export type Opener = (target: string) => void;

function openCommand(target: string): [string, string[]] {
  if (process.platform === 'darwin') return ['open', [target]];
  if (process.platform === 'win32') return ['cmd', ['/c', 'start', '""', target]];
  return ['xdg-open', [target]];
}

/** Hands a URL (http or mailto) to the desktop's default handler without waiting. */
export function createOpener(logger: Logger): Opener {
  return (target) => {
    const [command, args] = openCommand(target);
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.on('error', (error) => {
      logger.warn(`Unable to open ${target}: ${error.message}`);
    });
    child.unref();
  };
}

export function mailtoUrl(subject: string, body: string): string {
  return `mailto:?subject=${encodeURIComponent(subject)}&body=${encodeURIComponent(body)}`;
}

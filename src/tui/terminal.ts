import { emitKeypressEvents } from 'readline';
import { App } from './app.js';
import { resolveAction, type KeyPress } from './keys.js';
import { renderScreen } from './render.js';
import { createOpener } from '../utils/open.js';
import { errorMessage } from '../utils/errors.js';
import type { AppContext } from '../context.js';

export const TICK_MS = 100;

const ENTER_ALT_SCREEN = '\x1b[?1049h\x1b[?25l';
const LEAVE_ALT_SCREEN = '\x1b[?25h\x1b[?1049l';
const HOME = '\x1b[H';
const CLEAR_LINE = '\x1b[K';

interface ReadlineKey {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
}

/**
 * Runs the shell until the user quits. Resolves once the terminal has been
 * restored; operations still in flight are left behind.
 */
export function runInteractive(context: AppContext): Promise<void> {
  const { stdin, stdout } = process;
  if (!stdin.isTTY || !stdout.isTTY) {
    return Promise.reject(new Error('The interactive shell needs a terminal; use --refresh or a subcommand instead'));
  }

  const app = new App(context, { opener: createOpener(context.logger) });

  return new Promise((resolve, reject) => {
    const draw = (): void => {
      const lines = renderScreen(app.view(), stdout.columns, stdout.rows);
      stdout.write(HOME + lines.map((line) => line + CLEAR_LINE).join('\n'));
    };

    const stop = (): void => {
      clearInterval(timer);
      stdin.off('keypress', onKeypress);
      stdout.off('resize', draw);
      stdin.setRawMode(false);
      stdin.pause();
      stdout.write(LEAVE_ALT_SCREEN);
    };

    const guarded = (step: () => void): void => {
      try {
        step();
      } catch (error) {
        stop();
        context.logger.error(`[Shell] ${errorMessage(error)}`);
        reject(error);
      }
    };

    const onKeypress = (input: string | undefined, key: ReadlineKey | undefined): void => {
      guarded(() => {
        const press: KeyPress = { input, name: key?.name, ctrl: key?.ctrl, meta: key?.meta };
        const action = resolveAction(press, app.inputMode, app.helpVisible);
        if (!action) return;

        if (app.handleAction(action)) {
          stop();
          resolve();
          return;
        }
        draw();
      });
    };

    emitKeypressEvents(stdin);
    stdin.setRawMode(true);
    stdin.resume();
    stdout.write(ENTER_ALT_SCREEN);

    stdin.on('keypress', onKeypress);
    stdout.on('resize', draw);
    const timer = setInterval(() => {
      guarded(() => {
        app.tick();
        draw();
      });
    }, TICK_MS);

    guarded(() => {
      app.start();
      draw();
    });
  });
}

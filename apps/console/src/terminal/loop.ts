import readline from 'node:readline';
import type { ConsoleSession, CoreLogger } from '@tierdeck/core';
import { mapKey, type KeyInput } from './keymap';
import { renderScreen } from './render';

const ENTER_ALTERNATE_SCREEN = '\x1b[?1049h';
const LEAVE_ALTERNATE_SCREEN = '\x1b[?1049l';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const CURSOR_HOME = '\x1b[H';
const CLEAR_SCREEN = '\x1b[2J';

export type TerminalStreams = {
  input: NodeJS.ReadStream;
  output: NodeJS.WriteStream;
};

export type TerminalOptions = Partial<TerminalStreams> & {
  logger?: CoreLogger;
};

/**
 * Drives a console session from keypresses until it finishes. Keys are handled strictly one
 * at a time: the next key waits until every effect of the previous one has completed.
 */
export function runTerminal(session: ConsoleSession, options: TerminalOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  const draw = () => {
    const lines = renderScreen(session, { columns: output.columns ?? 120, rows: output.rows ?? 40 });
    output.write(`${CURSOR_HOME}${CLEAR_SCREEN}${lines.join('\r\n')}`);
  };

  return new Promise<void>((resolve, reject) => {
    let queue: Promise<void> = Promise.resolve();
    let closed = false;

    const restore = () => {
      if (closed) {
        return;
      }
      closed = true;
      input.off('keypress', onKeypress);
      output.off('resize', draw);
      if (input.isTTY) {
        input.setRawMode(false);
      }
      input.pause();
      output.write(`${SHOW_CURSOR}${LEAVE_ALTERNATE_SCREEN}`);
    };

    const fail = (error: unknown) => {
      restore();
      reject(error);
    };

    const handleKey = async (key: KeyInput) => {
      if (closed) {
        return;
      }
      const event = mapKey(session.state.mode, key);
      if (!event) {
        return;
      }
      options.logger?.debug({ event: event.type, mode: session.state.mode.kind }, 'dispatching event');
      await session.dispatch(event);
      if (session.finished) {
        restore();
        resolve();
        return;
      }
      draw();
    };

    function onKeypress(_text: string | undefined, key: readline.Key | undefined) {
      if (!key) {
        return;
      }
      queue = queue.then(() => handleKey(key)).catch(fail);
    }

    readline.emitKeypressEvents(input);
    if (input.isTTY) {
      input.setRawMode(true);
    }
    output.write(`${ENTER_ALTERNATE_SCREEN}${HIDE_CURSOR}`);
    input.on('keypress', onKeypress);
    output.on('resize', draw);
    input.resume();

    queue = queue
      .then(async () => {
        const starting = session.start();
        draw();
        await starting;
        draw();
      })
      .catch(fail);
  });
}

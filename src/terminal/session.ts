type TerminalOutput = {
  isTTY?: boolean;
  write: (chunk: string) => boolean;
};

type SignalHost = {
  once: (signal: NodeJS.Signals, listener: () => void) => unknown;
  off: (signal: NodeJS.Signals, listener: () => void) => unknown;
  exit: (code: number) => void;
};

const ENTER_ALT_SCREEN = '\x1b[?1049h';
const LEAVE_ALT_SCREEN = '\x1b[?1049l';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

// Exit code is 128 + signal number, as a shell reports it
const EXIT_SIGNALS: ReadonlyArray<[NodeJS.Signals, number]> = [
  ['SIGHUP', 1],
  ['SIGINT', 2],
  ['SIGTERM', 15],
];

/**
 * Runs `body` on the alternate screen with the cursor hidden and puts the
 * terminal back however `body` ends, including when the process is signalled.
 */
export async function withTerminal<T>(
  output: TerminalOutput,
  body: () => Promise<T>,
  host: SignalHost = process
): Promise<T> {
  if (output.isTTY !== true) return body();

  let restored = false;
  const restore = () => {
    if (restored) return;
    restored = true;
    output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
  };

  const handlers = EXIT_SIGNALS.map(([name, number]) => {
    const listener = () => {
      restore();
      host.exit(128 + number);
    };
    host.once(name, listener);
    return { name, listener };
  });

  output.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
  try {
    return await body();
  } finally {
    handlers.forEach(({ name, listener }) => host.off(name, listener));
    restore();
  }
}

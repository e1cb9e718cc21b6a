import { DisplaySurfaceError } from './core/errors.js';

export type KeyHandler = (key: string) => void;

const KEY_MAP: Record<string, string> = {
  '\x03': 'ctrl-c',
};

/** The slice of stdin raw key input needs. */
export interface KeyStream {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
  setEncoding: (encoding: BufferEncoding) => unknown;
  resume: () => unknown;
  pause: () => unknown;
  on: (event: 'data', listener: (data: string) => void) => unknown;
  off: (event: 'data', listener: (data: string) => void) => unknown;
}

export function parseKey(data: string): string {
  return KEY_MAP[data] ?? data;
}

export function setupInput(onKey: KeyHandler, stdin: KeyStream = process.stdin): () => void {
  if (!stdin.isTTY || !stdin.setRawMode) {
    throw new DisplaySurfaceError('gpuwatch requires an interactive terminal (TTY) on stdin');
  }
  const setRawMode = stdin.setRawMode;
  setRawMode.call(stdin, true);
  stdin.setEncoding('utf8');
  stdin.resume();

  const handler = (data: string): void => { onKey(parseKey(data)); };
  stdin.on('data', handler);

  return () => {
    setRawMode.call(stdin, false);
    stdin.pause();
    stdin.off('data', handler);
  };
}

export const ESC = '\x1b[';
export const moveTo = (row: number, col: number): string => `${ESC}${row};${col}H`;
export const clearScreen = `${ESC}2J${ESC}H`;
export const hideCursor = `${ESC}?25l`;
export const showCursor = `${ESC}?25h`;
export const enterAltScreen = `${ESC}?1049h`;
export const leaveAltScreen = `${ESC}?1049l`;

export const colors = {
  reset: `${ESC}0m`,
  bold: `${ESC}1m`,
  dim: `${ESC}2m`,
  red: `${ESC}31m`,
  green: `${ESC}32m`,
  yellow: `${ESC}33m`,
  blue: `${ESC}34m`,
  cyan: `${ESC}36m`,
};

export const c = {
  red: (s: string): string => `${colors.red}${s}${colors.reset}`,
  green: (s: string): string => `${colors.green}${s}${colors.reset}`,
  yellow: (s: string): string => `${colors.yellow}${s}${colors.reset}`,
  blue: (s: string): string => `${colors.blue}${s}${colors.reset}`,
  cyan: (s: string): string => `${colors.cyan}${s}${colors.reset}`,
  bold: (s: string): string => `${colors.bold}${s}${colors.reset}`,
  dim: (s: string): string => `${colors.dim}${s}${colors.reset}`,
};

const SGR = /\x1b\[[0-9;]*m/g;

export function stripAnsi(s: string): string {
  return s.replace(SGR, '');
}

export function visibleLength(s: string): number {
  return [...stripAnsi(s)].length;
}

export function pad(s: string, len: number, align: 'l' | 'r' = 'l'): string {
  const padding = Math.max(0, len - visibleLength(s));
  return align === 'l' ? s + ' '.repeat(padding) : ' '.repeat(padding) + s;
}

/** Cut plain text to `len` visible characters, marking the cut with an ellipsis. */
export function truncate(s: string, len: number): string {
  const chars = [...s];
  if (chars.length <= len) return s;
  if (len <= 1) return chars.slice(0, len).join('');
  return chars.slice(0, len - 1).join('') + '…';
}

export function formatMiB(mib: number): string {
  if (mib >= 1024) return (mib / 1024).toFixed(1) + ' GiB';
  return Math.round(mib) + ' MiB';
}

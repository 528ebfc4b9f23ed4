/**
 * ANSI terminal colors for CLI output.
 *
 * `createColors(false)` returns identity formatters, which keeps CLI output
 * assertions in tests free of escape codes.
 */

export type Formatter = (s: string | number) => string;

export interface Colors {
  enabled: boolean;
  bold: Formatter;
  red: Formatter;
  green: Formatter;
  yellow: Formatter;
  blue: Formatter;
  cyan: Formatter;
  gray: Formatter;
}

/**
 * NO_COLOR and FORCE_COLOR win, then a dumb terminal disables colors,
 * then a TTY or CI enables them
 */
export function detectColorSupport(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout?.isTTY === true
): boolean {
  // https://no-color.org/
  if ('NO_COLOR' in env) return false;
  if ('FORCE_COLOR' in env) return true;
  if (env.TERM === 'dumb') return false;
  if (isTTY) return true;
  return Boolean(env.CI);
}

export function createColors(enabled: boolean = detectColorSupport()): Colors {
  const code = (open: number, close: number): Formatter => {
    if (!enabled) return (s) => String(s);

    const openCode = `\x1b[${open}m`;
    const closeCode = `\x1b[${close}m`;
    const closeRe = new RegExp(`\\x1b\\[${close}m`, 'g');

    // Re-open after a nested close so colors.bold(colors.red('x')) stays bold
    return (s) => openCode + String(s).replace(closeRe, openCode) + closeCode;
  };

  return {
    enabled,
    bold: code(1, 22),
    red: code(31, 39),
    green: code(32, 39),
    yellow: code(33, 39),
    blue: code(34, 39),
    cyan: code(36, 39),
    gray: code(90, 39),
  };
}

const colors = createColors();

export default colors;

/**
 * Minimal terminal colors utility
 *
 * Supports:
 * - Color detection (NO_COLOR, FORCE_COLOR, TERM, CI, TTY)
 * - 8 colors + bold + dim
 * - Nestable: colors.bold(colors.red('text'))
 */

export type Env = Record<string, string | undefined>;

/**
 * Decide whether ANSI colors should be emitted
 */
export function detectColorSupport(env: Env = process.env, isTTY: boolean = Boolean(process.stdout?.isTTY)): boolean {
  // Respect NO_COLOR standard (https://no-color.org/)
  if ('NO_COLOR' in env) return false;

  if ('FORCE_COLOR' in env) return true;

  if (env.TERM === 'dumb') return false;

  if (isTTY) return true;

  // CI environments usually support colors
  if (env.CI) return true;

  return false;
}

export type Paint = (s: string | number) => string;

// ANSI escape code wrapper
const code = (enabled: boolean, open: number, close: number): Paint => {
  if (!enabled) return (s) => String(s);

  const openCode = `\x1b[${open}m`;
  const closeCode = `\x1b[${close}m`;
  const closeRe = new RegExp(`\\x1b\\[${close}m`, 'g');

  return (s) => {
    // Handle nested codes by replacing inner close with open+close
    return openCode + String(s).replace(closeRe, openCode) + closeCode;
  };
};

export interface Colors {
  enabled: boolean;
  bold: Paint;
  dim: Paint;
  italic: Paint;
  red: Paint;
  green: Paint;
  yellow: Paint;
  blue: Paint;
  cyan: Paint;
  white: Paint;
  gray: Paint;
}

export function createColors(enabled: boolean): Colors {
  return {
    enabled,
    bold: code(enabled, 1, 22),
    dim: code(enabled, 2, 22),
    italic: code(enabled, 3, 23),
    red: code(enabled, 31, 39),
    green: code(enabled, 32, 39),
    yellow: code(enabled, 33, 39),
    blue: code(enabled, 34, 39),
    cyan: code(enabled, 36, 39),
    white: code(enabled, 37, 39),
    gray: code(enabled, 90, 39),
  };
}

const colors = createColors(detectColorSupport());

export default colors;

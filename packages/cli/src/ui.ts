// ============================================================================
// @fimsmith/cli — Terminal Output Helpers
// ============================================================================

export interface ColorEnv {
  NO_COLOR?: string;
  FORCE_COLOR?: string;
}

export function supportsColor(
  hasFlag: (name: string) => boolean,
  env: ColorEnv,
  isTTY: boolean,
): boolean {
  if (hasFlag('no-color') || env.NO_COLOR === '1') return false;
  if (hasFlag('color')) return true;
  if (env.FORCE_COLOR === '1') return true;
  return isTTY;
}

// ── ANSI Color Helpers ──────────────────────────────────────────────────────

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  brightGreen: '\x1b[92m',
  brightCyan: '\x1b[96m',
  brightWhite: '\x1b[97m',
};

export interface Palette {
  pass(text: string): string;
  fail(text: string): string;
  warn(text: string): string;
  accent(text: string): string;
  heading(text: string): string;
  dim(text: string): string;
  num(text: string): string;
}

export function createPalette(useColor: boolean): Palette {
  const clr = (color: string, text: string): string =>
    useColor ? `${color}${text}${ANSI.reset}` : text;
  return {
    pass: (text) => clr(ANSI.brightGreen, text),
    fail: (text) => clr(ANSI.red, text),
    warn: (text) => clr(ANSI.yellow, text),
    accent: (text) => clr(ANSI.magenta, text),
    heading: (text) => clr(ANSI.bold + ANSI.brightWhite, text),
    dim: (text) => clr(ANSI.dim, text),
    num: (text) => clr(ANSI.brightCyan, text),
  };
}

export function padR(s: string, n: number): string {
  return s.padEnd(n);
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

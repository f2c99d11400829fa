// ============================================================================
// @fimsmith/cli — Argument Reading
// ============================================================================

/**
 * Flags that never take a value. Anything else written as `--name` consumes
 * the following argument.
 */
const BOOLEAN_FLAGS = new Set(['with-meta', 'json', 'no-color', 'color', 'help', 'verbose', 'quiet']);

/**
 * Bad command-line usage (missing or malformed flag). Exit code 2.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ArgReader {
  private readonly args: readonly string[];

  constructor(args: readonly string[]) {
    this.args = args;
  }

  getFlag(name: string): string | undefined {
    const idx = this.args.indexOf(`--${name}`);
    if (idx === -1) return undefined;
    const value = this.args[idx + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`--${name} needs a value`);
    }
    return value;
  }

  hasFlag(name: string): boolean {
    return this.args.includes(`--${name}`);
  }

  /**
   * Every argument after `--name` up to the next flag.
   */
  getList(name: string): string[] | undefined {
    const idx = this.args.indexOf(`--${name}`);
    if (idx === -1) return undefined;
    const values: string[] = [];
    for (let i = idx + 1; i < this.args.length && !this.args[i].startsWith('--'); i++) {
      values.push(this.args[i]);
    }
    if (values.length === 0) {
      throw new UsageError(`--${name} needs at least one value`);
    }
    return values;
  }

  getNumber(name: string): number | undefined {
    const raw = this.getFlag(name);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
      throw new UsageError(`--${name} expects a number, got "${raw}"`);
    }
    return value;
  }

  /**
   * Arguments that are neither flags nor flag values.
   */
  positionals(): string[] {
    const out: string[] = [];
    for (let i = 0; i < this.args.length; i++) {
      const arg = this.args[i];
      if (arg.startsWith('--')) {
        if (!BOOLEAN_FLAGS.has(arg.slice(2))) i++;
        continue;
      }
      out.push(arg);
    }
    return out;
  }
}

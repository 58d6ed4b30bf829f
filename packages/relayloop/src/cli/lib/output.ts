/**
 * Output manager: JSON for machines, colored text for humans.
 *
 * Results go to stdout; errors and notices go to stderr.
 */

import pc from 'picocolors';

export function createColors(enabled: boolean) {
  const c = pc.createColors(enabled);
  return {
    bold: c.bold,
    dim: c.dim,
    success: c.green,
    error: c.red,
    warn: c.yellow,
    info: c.blue,
    id: c.cyan,
    label: c.magenta,
  };
}

export type Colors = ReturnType<typeof createColors>;

export interface OutputOptions {
  json: boolean;
  color?: boolean;
}

export class OutputManager {
  private readonly colors: Colors;

  constructor(private readonly opts: OutputOptions) {
    this.colors = createColors(!opts.json && (opts.color ?? pc.isColorSupported));
  }

  get isJson(): boolean {
    return this.opts.json;
  }

  getColors(): Colors {
    return this.colors;
  }

  /** Print data as JSON in --json mode, otherwise through the human renderer. */
  data<T>(value: T, human: () => void): void {
    if (this.opts.json) {
      console.log(JSON.stringify(value, null, 2));
    } else {
      human();
    }
  }

  info(message: string): void {
    if (!this.opts.json) console.error(message);
  }

  success(message: string): void {
    if (!this.opts.json) console.error(`${this.colors.success('✓')} ${message}`);
  }

  warn(message: string): void {
    if (!this.opts.json) console.error(`${this.colors.warn('⚠')} ${message}`);
  }

  error(code: string, message: string): void {
    this.data({ error: { code, message } }, () => {
      console.error(this.colors.error(`Error [${code}]: ${message}`));
    });
  }
}

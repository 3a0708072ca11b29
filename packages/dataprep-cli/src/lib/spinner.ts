/**
 * Spinner wrapper that respects quiet/JSON mode.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  text: string;
}

export type SpinnerFactory = (text?: string) => Spinner;

/**
 * No-op spinner for quiet/JSON mode.
 */
class SilentSpinner implements Spinner {
  text = "";

  start(_text?: string): Spinner {
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(_text?: string): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }
}

/**
 * Wrapper around ora. Draws on stderr so stdout keeps only status lines.
 */
class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }
}

/**
 * Create a spinner that respects quiet/JSON mode.
 */
export const createSpinner: SpinnerFactory = (text) => {
  if (isQuietMode() || isJsonMode()) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
};

/**
 * Spinner factory that never draws anything.
 */
export const silentSpinnerFactory: SpinnerFactory = () => new SilentSpinner();

/**
 * Format a byte count for progress text ("1.5 MB").
 */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

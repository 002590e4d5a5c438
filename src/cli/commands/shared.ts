import type { Config } from '../../types/index.js';
import { isErr } from '../../types/index.js';
import { loadConfig } from '../../config/config.js';

export interface GlobalOptions {
  config?: string;
}

/**
 * Load configuration or print the problem and exit with code 1.
 */
export function loadConfigOrExit(options: GlobalOptions): Config {
  const result = loadConfig({ configFile: options.config });
  if (isErr(result)) {
    process.stderr.write(`${result.error.message}\n`);
    process.exit(1);
  }
  return result.data;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from '../utils/logger.js';

/**
 * Parse `KEY=value` lines. Blank lines and `#` comments are skipped,
 * surrounding quotes are stripped.
 */
export function parseEnv(content: string): Record<string, string> {
  const vars: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const match = trimmed.match(/^([^=]+)=(.*)$/);
    if (!match) continue;

    const [, key, value] = match;
    let cleanValue = value.trim();
    if ((cleanValue.startsWith('"') && cleanValue.endsWith('"')) ||
        (cleanValue.startsWith("'") && cleanValue.endsWith("'"))) {
      cleanValue = cleanValue.slice(1, -1);
    }
    vars[key.trim()] = cleanValue;
  }

  return vars;
}

/**
 * Load a .env file into `env` (default: process.env).
 * A missing file is reported, not fatal.
 *
 * @param filePath Path to .env file; `true` means ./.env
 */
export async function loadEnvFile(
  filePath: string | boolean = true,
  options: { env?: Record<string, string | undefined>; logger?: Logger } = {}
): Promise<Record<string, string>> {
  const envPath = typeof filePath === 'string' ? filePath : join(process.cwd(), '.env');
  const env = options.env ?? process.env;

  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      options.logger?.warn(`No .env file found at ${envPath}`);
      return {};
    }
    throw error;
  }

  const vars = parseEnv(content);
  for (const [key, value] of Object.entries(vars)) {
    env[key] = value;
  }

  options.logger?.debug(`Loaded ${Object.keys(vars).length} variables from ${envPath}`);
  return vars;
}

#!/usr/bin/env node
import { InvalidArgumentError, program } from 'commander';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { loadConfig } from '../config/index.js';
import { loadEnvFile } from '../config/env-file.js';
import { MonitorError } from '../core/errors.js';
import colors from '../utils/colors.js';
import { isLogLevel, Logger } from '../utils/logger.js';
import { startDashboard } from './tui/dashboard.js';

interface CliOptions {
  apiKey?: string;
  interval?: number;
  capacity?: number;
  width?: number;
  plain?: boolean;
  config?: string;
  env?: string | boolean;
  verbose?: boolean;
  logLevel?: string;
}

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  const parsed = PackageSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : '0.0.0';
}

function parseInteger(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

function reportError(error: unknown): void {
  if (error instanceof MonitorError) {
    console.error(colors.red(`Error: ${error.message}`));
    for (const suggestion of error.suggestions) {
      console.error(colors.gray(`  • ${suggestion}`));
    }
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  console.error(colors.red(`Error: ${message}`));
}

async function main() {
  program
    .name('pws-monitor')
    .description('Live terminal dashboard for a personal weather station')
    .version(readVersion())
    .argument('[stationId]', 'Station ID (or PWS_STATION_ID)')
    .option('-k, --api-key <key>', 'API key (or PWS_API_KEY)')
    .option('-i, --interval <seconds>', 'Seconds between refreshes', parseInteger(1))
    .option('-c, --capacity <samples>', 'Samples kept per metric', parseInteger(1))
    .option('-w, --width <glyphs>', 'Sparkline width', parseInteger(0))
    .option('--plain', 'Plain output without colors or cursor control')
    .option('--config <path>', 'JSON config file')
    .option('-e, --env [path]', 'Load .env file from current directory or specified path')
    .option('-v, --verbose', 'Debug logging to stderr')
    .option('--log-level <level>', 'debug, info, warn, error or none')
    .addHelpText('after', `
${colors.bold(colors.yellow('Examples:'))}
  ${colors.green('$ pws-monitor KCASANFR123 --api-key test-secret')}
  ${colors.green('$ pws-monitor --env --interval 30 --width 40')}
  ${colors.green('$ pws-monitor --config ./pws.json --plain')}
`)
    .action(async (stationId: string | undefined, options: CliOptions) => {
      const level = options.verbose ? 'debug' : options.logLevel;
      const logger = new Logger(level !== undefined && isLogLevel(level) ? { level } : {});

      try {
        if (options.env !== undefined) {
          await loadEnvFile(options.env, { logger });
        }

        const config = await loadConfig({
          file: options.config,
          flags: {
            stationId,
            apiKey: options.apiKey,
            interval: options.interval,
            capacity: options.capacity,
            width: options.width,
            plain: options.plain,
            verbose: options.verbose,
            logLevel: options.logLevel,
          },
        });

        if (config.logLevel) logger.setLevel(config.logLevel);
        await startDashboard(config, logger);
      } catch (error) {
        reportError(error);
        process.exitCode = 1;
      }
    });

  await program.parseAsync();
}

main().catch((error: unknown) => {
  reportError(error);
  process.exit(1);
});

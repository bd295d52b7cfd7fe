#!/usr/bin/env node
/**
 * @module cli
 *
 * `tilecrawl --config <path>`
 *
 * Loads the configuration, runs every source and exits with 0, or with 1
 * when the configuration is invalid, the run fails, or any source
 * reported an error. The first SIGINT stops the run between tiles; a
 * second one exits immediately.
 */

import { parseArgs } from 'node:util';
import { loadConfig, type AppConfig } from './config.js';
import { createConsoleLogger, errorMessage, parseLogLevel } from './logger.js';
import { runSources } from './runner.js';

const USAGE = 'Usage: tilecrawl [--config <path>]';

async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c', default: 'config/config.json' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const configPath = values.config ?? 'config/config.json';
  const bootLogger = createConsoleLogger('info');
  let config: AppConfig;
  try {
    config = await loadConfig(configPath);
  } catch (err) {
    bootLogger.error('Error loading configuration', { path: configPath, error: errorMessage(err) });
    return 1;
  }

  const logger = createConsoleLogger(parseLogLevel(config.global.log_level));
  logger.info('Loaded configuration', { path: configPath });

  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) process.exit(130);
    logger.warn('Interrupted, finishing in-flight tiles');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  try {
    const reports = await runSources(config, { logger, signal: controller.signal });
    return reports.some(r => r.error !== undefined) ? 1 : 0;
  } catch (err) {
    logger.error('Fatal error', { error: errorMessage(err) });
    return 1;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

main(process.argv.slice(2)).then(
  code => { process.exitCode = code; },
  (err: unknown) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  },
);

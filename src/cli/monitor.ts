import { Command } from 'commander';
import { loadConfig, type AppConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { describeError } from '../errors.js';
import { runApp, type RunMode } from '../app.js';

function loadOrFail(path?: string): AppConfig | null {
  try {
    return loadConfig(path);
  } catch (err) {
    console.error(describeError(err));
    process.exitCode = 1;
    return null;
  }
}

async function run(mode: RunMode, opts: { config?: string; interval?: string }): Promise<void> {
  const config = loadOrFail(opts.config);
  if (!config) return;

  if (opts.interval !== undefined) {
    const seconds = parseInt(opts.interval, 10);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      console.error('--interval must be a positive number of seconds');
      process.exitCode = 1;
      return;
    }
    config.checkIntervalSec = seconds;
  }

  if (config.products.length === 0) {
    console.error(`No products configured in ${config.source}.`);
    process.exitCode = 1;
    return;
  }

  const log = createLogger(config.logging);
  try {
    await runApp(config, log, mode);
  } catch (err) {
    log.error({ err: describeError(err) }, 'Fatal error');
    process.exitCode = 1;
  }
}

export function registerMonitorCommands(program: Command): void {
  program
    .command('check')
    .description('Check every product once, alert for each one in stock, then exit')
    .option('--config <path>', 'Custom config file path')
    .action(async (opts: { config?: string }) => {
      await run('single', opts);
    });

  program
    .command('monitor')
    .description('Check products continuously and alert when one comes back in stock')
    .option('--config <path>', 'Custom config file path')
    .option('--interval <seconds>', 'Override the check interval')
    .action(async (opts: { config?: string; interval?: string }) => {
      await run('continuous', opts);
    });
}

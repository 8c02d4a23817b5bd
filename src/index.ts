import { loadConfig, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { describeError } from './errors.js';
import { runApp } from './app.js';

const configPath = process.argv.includes('--config')
  ? process.argv[process.argv.indexOf('--config') + 1]
  : undefined;

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig(configPath);
  } catch (err) {
    console.error(describeError(err));
    process.exitCode = 1;
    return;
  }

  const log = createLogger(config.logging);

  if (config.products.length === 0) {
    log.error('No products configured. Add products to config.json or PRODUCTS_JSON');
    process.exitCode = 1;
    return;
  }

  try {
    await runApp(config, log, config.singleCheck ? 'single' : 'continuous');
    log.info('Done');
  } catch (err) {
    log.error({ err: describeError(err) }, 'Fatal error');
    process.exitCode = 1;
  }
}

void main();

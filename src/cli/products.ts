import { Command } from 'commander';
import Table from 'cli-table3';
import { loadConfig, type AppConfig } from '../config.js';
import { describeError } from '../errors.js';

export function registerProductCommands(program: Command): void {
  program
    .command('products')
    .description('List the configured products')
    .option('--config <path>', 'Custom config file path')
    .action((opts: { config?: string }) => {
      let config: AppConfig;
      try {
        config = loadConfig(opts.config);
      } catch (err) {
        console.error(describeError(err));
        process.exitCode = 1;
        return;
      }

      if (config.products.length === 0) {
        console.log(`No products configured in ${config.source}.`);
        return;
      }

      const table = new Table({
        head: ['#', 'Name', 'Fetch', 'Pincode', 'URL'],
        style: { head: ['cyan'] },
      });

      config.products.forEach((product, i) => {
        table.push([
          String(i + 1),
          product.name,
          product.useBrowser ? 'browser' : 'http',
          product.pincode ?? '-',
          product.url.length > 60 ? product.url.slice(0, 57) + '...' : product.url,
        ]);
      });

      console.log(table.toString());
      console.log(`\nSource: ${config.source}`);
      console.log(`Check interval: ${config.checkIntervalSec}s`);
      console.log(`Telegram: ${config.telegram ? 'enabled' : 'disabled'}`);
    });
}

#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import { registerMonitorCommands } from './monitor.js';
import { registerProductCommands } from './products.js';
import { registerTelegramCommands } from './telegram.js';

const require = createRequire(import.meta.url);
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = require(resolve(__dirname, '../../package.json')) as { version: string };

const program = new Command();
program
  .name('stockwatch')
  .version(pkg.version)
  .description('Watch product pages for restocks and send email and Telegram alerts');

registerMonitorCommands(program);
registerProductCommands(program);
registerTelegramCommands(program);

await program.parseAsync();

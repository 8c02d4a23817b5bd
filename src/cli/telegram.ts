import { Command } from 'commander';
import { loadConfig } from '../config.js';
import { describeError } from '../errors.js';
import { sendTelegramMessage, formatStockAlert, type TelegramConfig } from '../notify/telegram.js';

export function registerTelegramCommands(program: Command): void {
  const telegramCmd = program.command('telegram').description('Telegram notifications');

  telegramCmd
    .command('test')
    .description('Send a sample stock alert to the configured chat')
    .option('--config <path>', 'Custom config file path')
    .action(async (opts: { config?: string }) => {
      let telegram: TelegramConfig | null;
      try {
        telegram = loadConfig(opts.config).telegram;
      } catch (err) {
        console.error(describeError(err));
        process.exitCode = 1;
        return;
      }

      if (!telegram) {
        console.error('Telegram not configured. Set TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID.');
        process.exitCode = 1;
        return;
      }

      const message = formatStockAlert({
        productName: 'Test Product',
        url: 'https://shop.example.com/products/test',
        reason: 'test alert',
        checkedAt: new Date(),
      });

      console.log('Sending test alert...');
      const result = await sendTelegramMessage(telegram, message);

      if (result.ok) {
        console.log('Test alert sent successfully! Check your Telegram.');
      } else {
        console.error(`Failed to send: ${result.error}`);
        process.exitCode = 1;
      }
    });
}

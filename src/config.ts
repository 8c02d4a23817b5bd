import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { LogLevel } from './logger.js';
import type { TelegramConfig } from './notify/telegram.js';

export interface ModalSelectors {
  modal: string;
  input: string;
  submit: string;
}

export interface ProductConfig {
  name: string;
  url: string;
  useBrowser: boolean;
  pincode: string | null;
  selectors: ModalSelectors;
}

export interface EmailConfig {
  smtpServer: string;
  smtpPort: number;
  senderEmail: string | null;
  senderPassword: string | null;
  recipientEmail: string | null;
}

export interface AppConfig {
  /** Where the settings came from: a file path, or "environment". */
  source: string;
  email: EmailConfig;
  telegram: TelegramConfig | null;
  products: ProductConfig[];
  checkIntervalSec: number;
  userAgent: string;
  browser: {
    executablePath: string | null;
  };
  singleCheck: boolean;
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}

export const DEFAULT_SELECTORS: ModalSelectors = {
  modal: '#locationWidgetModal',
  input: '#search',
  submit: '.btn-success',
};

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const DEFAULT_CHROME_BIN = '/usr/bin/chromium-browser';
const DEFAULT_CHECK_INTERVAL_SEC = 300;
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

type Env = NodeJS.ProcessEnv;

const envStr = (env: Env, k: string, d: string): string => env[k] || d;

const envInt = (env: Env, k: string, d: number): number => {
  const v = env[k];
  if (!v) return d;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : d;
};

const envBool = (env: Env, k: string, d: boolean): boolean =>
  /^(1|true|yes|on)$/i.test(env[k] ?? String(d));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | null {
  const value = obj[key];
  if (value === undefined || value === null || value === '') return null;
  if (typeof value !== 'string') {
    throw new Error(`Config error: "${where}.${key}" must be a string`);
  }
  return value;
}

function optionalNumber(obj: Record<string, unknown>, key: string, where: string, fallback: number): number {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return parseInt(value, 10);
  throw new Error(`Config error: "${where}.${key}" must be a number`);
}

function parseSelectors(raw: unknown, where: string): ModalSelectors {
  if (raw === undefined || raw === null) return { ...DEFAULT_SELECTORS };
  if (!isRecord(raw)) {
    throw new Error(`Config error: "${where}" must be an object`);
  }
  return {
    modal: optionalString(raw, 'modal', where) ?? DEFAULT_SELECTORS.modal,
    input: optionalString(raw, 'input', where) ?? DEFAULT_SELECTORS.input,
    submit: optionalString(raw, 'submit_button', where) ?? DEFAULT_SELECTORS.submit,
  };
}

export function parseProduct(raw: unknown, index: number): ProductConfig {
  const where = `products[${index}]`;
  if (!isRecord(raw)) {
    throw new Error(`Config error: "${where}" must be an object`);
  }

  const name = optionalString(raw, 'name', where);
  if (!name || !name.trim()) {
    throw new Error(`Config error: "${where}.name" is required`);
  }

  const url = optionalString(raw, 'url', where);
  if (!url || !/^https?:\/\//i.test(url)) {
    throw new Error(`Config error: "${where}.url" must be an http(s) URL`);
  }

  const useSelenium = raw['use_selenium'] ?? false;
  if (typeof useSelenium !== 'boolean') {
    throw new Error(`Config error: "${where}.use_selenium" must be a boolean`);
  }

  const pincode = raw['pincode'];
  if (pincode !== undefined && pincode !== null && typeof pincode !== 'string' && typeof pincode !== 'number') {
    throw new Error(`Config error: "${where}.pincode" must be a string`);
  }
  const pincodeText = pincode === undefined || pincode === null ? '' : String(pincode).trim();
  if (pincodeText && !/^[A-Za-z0-9 -]+$/.test(pincodeText)) {
    throw new Error(`Config error: "${where}.pincode" may only contain letters, digits, spaces and dashes`);
  }

  return {
    name: name.trim(),
    url,
    useBrowser: useSelenium,
    pincode: pincodeText || null,
    selectors: parseSelectors(raw['pincode_selectors'], `${where}.pincode_selectors`),
  };
}

function parseProducts(raw: unknown): ProductConfig[] {
  if (!Array.isArray(raw)) {
    throw new Error('Config error: "products" must be an array');
  }
  return raw.map((entry, i) => parseProduct(entry, i));
}

function parseEmail(raw: unknown): EmailConfig {
  if (raw === undefined || raw === null) {
    return { smtpServer: 'smtp.gmail.com', smtpPort: 587, senderEmail: null, senderPassword: null, recipientEmail: null };
  }
  if (!isRecord(raw)) {
    throw new Error('Config error: "email" must be an object');
  }
  return {
    smtpServer: optionalString(raw, 'smtp_server', 'email') ?? 'smtp.gmail.com',
    smtpPort: optionalNumber(raw, 'smtp_port', 'email', 587),
    senderEmail: optionalString(raw, 'sender_email', 'email'),
    senderPassword: optionalString(raw, 'sender_password', 'email'),
    recipientEmail: optionalString(raw, 'recipient_email', 'email'),
  };
}

function validateConfig(config: AppConfig): void {
  const port = config.email.smtpPort;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error('Config error: "email.smtp_port" must be an integer between 1 and 65535');
  }

  if (!Number.isFinite(config.checkIntervalSec) || config.checkIntervalSec <= 0) {
    throw new Error('Config error: "check_interval" must be a positive number of seconds');
  }

  const seen = new Set<string>();
  for (const product of config.products) {
    if (seen.has(product.name)) {
      throw new Error(`Config error: duplicate product name "${product.name}"`);
    }
    seen.add(product.name);
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Settings that always come from the environment, whether or not a config file exists. */
function ambientSettings(env: Env): Pick<AppConfig, 'telegram' | 'browser' | 'singleCheck' | 'logging'> {
  const botToken = env['TELEGRAM_BOT_TOKEN'];
  const chatId = env['TELEGRAM_CHAT_ID'];

  const chromeBin = envStr(env, 'CHROME_BIN', DEFAULT_CHROME_BIN);

  const level = envStr(env, 'LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`Config error: "LOG_LEVEL" must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  const format = env['LOG_FORMAT']?.toLowerCase();
  const pretty = format === 'pretty' ? true : format === 'json' ? false : process.stdout.isTTY === true;

  return {
    telegram: botToken && chatId ? { botToken, chatId } : null,
    browser: { executablePath: existsSync(chromeBin) ? chromeBin : null },
    singleCheck: envBool(env, 'SINGLE_CHECK', false),
    logging: { level, pretty },
  };
}

function configFromFile(raw: unknown, source: string, env: Env): AppConfig {
  if (!isRecord(raw)) {
    throw new Error(`Config error: ${source} must contain a JSON object`);
  }
  return {
    source,
    email: parseEmail(raw['email']),
    products: parseProducts(raw['products'] ?? []),
    checkIntervalSec: optionalNumber(raw, 'check_interval', 'config', DEFAULT_CHECK_INTERVAL_SEC),
    userAgent: optionalString(raw, 'user_agent', 'config') ?? DEFAULT_USER_AGENT,
    ...ambientSettings(env),
  };
}

function configFromEnv(env: Env): AppConfig {
  let products: unknown;
  try {
    products = JSON.parse(envStr(env, 'PRODUCTS_JSON', '[]'));
  } catch {
    throw new Error('Config error: PRODUCTS_JSON is not valid JSON');
  }

  return {
    source: 'environment',
    email: {
      smtpServer: envStr(env, 'SMTP_SERVER', 'smtp.gmail.com'),
      smtpPort: envInt(env, 'SMTP_PORT', 587),
      senderEmail: env['SENDER_EMAIL'] || null,
      senderPassword: env['SENDER_PASSWORD'] || null,
      recipientEmail: env['RECIPIENT_EMAIL'] || null,
    },
    products: parseProducts(products),
    checkIntervalSec: envInt(env, 'CHECK_INTERVAL', DEFAULT_CHECK_INTERVAL_SEC),
    userAgent: envStr(env, 'USER_AGENT', DEFAULT_USER_AGENT),
    ...ambientSettings(env),
  };
}

/**
 * Reads `config.json` (or `path`) when it exists, otherwise builds the whole
 * configuration from environment variables.
 */
export function loadConfig(path?: string, env: Env = process.env): AppConfig {
  const configPath = resolve(path ?? 'config.json');

  let config: AppConfig;
  if (existsSync(configPath)) {
    const raw = readFileSync(configPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new Error(`Config error: invalid JSON in ${configPath}`);
    }
    config = configFromFile(parsed, configPath, env);
  } else {
    config = configFromEnv(env);
  }

  validateConfig(config);
  return config;
}
